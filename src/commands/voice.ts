import { Interaction, SlashCommandBuilder } from "discord.js";
import { buildVoiceCommandContext } from "../voice/context";
import { getVoiceRuntime } from "../voice/voiceRuntime";
import { listVoiceProfiles, resetVoiceProfile, setVoiceProfile } from "../voice/voiceService";

export const voiceCommandData = new SlashCommandBuilder()
  .setName("voice")
  .setDescription("読み上げボイスを設定します")
  .addSubcommand((subcommand) =>
    subcommand.setName("list").setDescription("利用できるボイスを表示します")
  )
  .addSubcommand((subcommand) =>
    subcommand
      .setName("set")
      .setDescription("このチャンネルで使うボイスを設定します")
      .addStringOption((option) =>
        option.setName("name").setDescription("ボイス名").setRequired(true)
      )
  )
  .addSubcommand((subcommand) =>
    subcommand.setName("reset").setDescription("このチャンネルのボイスを既定に戻します")
  );

export async function handleVoiceCommand(interaction: Interaction) {
  if (!interaction.isChatInputCommand()) {
    return;
  }

  const context = await buildVoiceCommandContext(interaction);
  if (!context) {
    await interaction.reply("このコマンドはギルド内でのみ実行できます。");
    return;
  }

  const subcommand = interaction.options.getSubcommand();
  if (subcommand === "list") {
    const reply = listVoiceProfiles(getVoiceRuntime(), context);
    await interaction.reply({ content: reply.text, ephemeral: true });
    return;
  }

  if (subcommand === "set") {
    const name = interaction.options.getString("name", true);
    const reply = setVoiceProfile(getVoiceRuntime(), context, name);
    await interaction.reply({ content: reply.text, ephemeral: true });
    return;
  }

  if (subcommand === "reset") {
    const reply = resetVoiceProfile(getVoiceRuntime(), context);
    await interaction.reply({ content: reply.text, ephemeral: true });
  }
}
