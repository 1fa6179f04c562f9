import { Interaction, SlashCommandBuilder } from "discord.js";
import { MAX_MESSAGE_CHARS } from "../constants";
import { buildVoiceCommandContext } from "../voice/context";
import { getVoiceRuntime } from "../voice/voiceRuntime";
import { sayVoice } from "../voice/voiceService";

export const sayCommandData = new SlashCommandBuilder()
  .setName("say")
  .setDescription("メッセージをボイスチャンネルで読み上げます")
  .addStringOption((option) =>
    option
      .setName("message")
      .setDescription("読み上げるメッセージ")
      .setMaxLength(MAX_MESSAGE_CHARS)
      .setRequired(true)
  );

export async function handleSayCommand(interaction: Interaction) {
  if (!interaction.isChatInputCommand()) {
    return;
  }

  const context = await buildVoiceCommandContext(interaction);
  if (!context) {
    await interaction.reply("このコマンドはギルド内でのみ実行できます。");
    return;
  }

  const message = interaction.options.getString("message", true);
  await interaction.deferReply();
  const reply = await sayVoice(getVoiceRuntime(), context, message);
  await interaction.editReply(reply.text);
}
