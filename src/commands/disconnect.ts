import { Interaction, SlashCommandBuilder } from "discord.js";
import { buildVoiceCommandContext } from "../voice/context";
import { getVoiceRuntime } from "../voice/voiceRuntime";
import { disconnectVoice } from "../voice/voiceService";

export const disconnectCommandData = new SlashCommandBuilder()
  .setName("disconnect")
  .setDescription("ボイスチャンネルから切断します");

export async function handleDisconnectCommand(interaction: Interaction) {
  if (!interaction.isChatInputCommand()) {
    return;
  }

  const context = await buildVoiceCommandContext(interaction);
  if (!context) {
    await interaction.reply("このコマンドはギルド内でのみ実行できます。");
    return;
  }

  const reply = await disconnectVoice(getVoiceRuntime(), context);
  await interaction.reply(reply.text);
}
