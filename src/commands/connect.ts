import { Interaction, SlashCommandBuilder } from "discord.js";
import { buildVoiceCommandContext } from "../voice/context";
import { getVoiceRuntime } from "../voice/voiceRuntime";
import { connectVoice } from "../voice/voiceService";

export const connectCommandData = new SlashCommandBuilder()
  .setName("connect")
  .setDescription("あなたのいるボイスチャンネルに接続します");

export async function handleConnectCommand(interaction: Interaction) {
  if (!interaction.isChatInputCommand()) {
    return;
  }

  const context = await buildVoiceCommandContext(interaction);
  if (!context) {
    await interaction.reply("このコマンドはギルド内でのみ実行できます。");
    return;
  }

  // 接続完了まで数秒かかることがあるため先に応答を保留する。
  await interaction.deferReply();
  const reply = await connectVoice(getVoiceRuntime(), context);
  await interaction.editReply(reply.text);
}
