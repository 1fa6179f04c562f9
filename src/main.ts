//必要なパッケージをインポートする
import {
  CacheType,
  Client,
  Events,
  GatewayIntentBits,
  Interaction,
} from "discord.js";
import dotenv from "dotenv";
import { connectCommandData, handleConnectCommand } from "./commands/connect";
import { disconnectCommandData, handleDisconnectCommand } from "./commands/disconnect";
import { handleSayCommand, sayCommandData } from "./commands/say";
import { handleVoiceCommand, voiceCommandData } from "./commands/voice";
import { buildBotChannelRef } from "./voice/context";
import { initVoiceRuntime } from "./voice/voiceRuntime";
import { handleBotVoiceStateUpdate } from "./voice/voiceService";

//.envファイルを読み込む
dotenv.config();

//Botで使うGatewayIntents
const client = new Client({
  intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
});

const voiceRuntime = initVoiceRuntime(client);

const handlers = new Map<string, (interaction: Interaction<CacheType>) => Promise<void>>([
  [connectCommandData.name, handleConnectCommand],
  [disconnectCommandData.name, handleDisconnectCommand],
  [sayCommandData.name, handleSayCommand],
  [voiceCommandData.name, handleVoiceCommand],
]);

//Botがきちんと起動したか確認
client.once(Events.ClientReady, (readyClient) => {
  console.log("Ready!");
  console.log(readyClient.user.tag);
});

// ボット自身が通話から外されたら片付け、移動させられたら追従する
client.on(Events.VoiceStateUpdate, (_, newState) => {
  if (newState.id !== client.user?.id) {
    return;
  }
  const channel = buildBotChannelRef(newState);
  if (newState.channelId !== null && channel === null) {
    return;
  }
  handleBotVoiceStateUpdate(voiceRuntime, newState.guild.id, channel).catch((error) => {
    console.error("[VOICE] voice state update error:", error);
  });
});

// スラッシュコマンド
client.on(Events.InteractionCreate, async (interaction: Interaction<CacheType>) => {
  if (!interaction.isChatInputCommand()) {
    return;
  }

  const handler = handlers.get(interaction.commandName);
  if (!handler) {
    return;
  }

  try {
    await handler(interaction);
  } catch (e) {
    console.log("エラーが発生しました");
    console.error(e);
  }
});

//ボット作成時のトークンでDiscordと接続
client.login(process.env.TOKEN).catch((error) => {
  console.error("ログインに失敗しました。", error);
  process.exitCode = 1;
});
