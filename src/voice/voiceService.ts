import { VoiceCommandError, toVoiceCommandError } from "../errors";
import type { VoiceSessionRegistry } from "../state";
import type {
  ConnectionResult,
  VoiceChannelRef,
  VoiceCommandContext,
  VoiceCommandReply,
  VoiceOperation,
} from "../types";
import {
  connectOrMove,
  disconnect,
  followExternalMove,
  releaseSession,
} from "./connectionCoordinator";
import { type DispatcherDeps, speak } from "./speechDispatcher";

export type VoiceServiceDeps = DispatcherDeps & {
  registry: VoiceSessionRegistry;
};

const FAILURE_TITLES: Record<VoiceOperation, string> = {
  connect: "接続できませんでした",
  move: "移動できませんでした",
  disconnect: "切断できませんでした",
  speak: "読み上げできませんでした",
};

const NOT_IN_VOICE_TEXT = "ボイスチャンネルに参加してから再度試してください。";

// エラーの種別と操作の値だけを見て返信文を決める。
export function formatFailure(error: VoiceCommandError, fallback: VoiceOperation): VoiceCommandReply {
  if (error.kind === "NOT_CONNECTED") {
    return { kind: "info", text: `ℹ️ ${error.message}` };
  }
  const title = FAILURE_TITLES[error.operation ?? fallback];
  return { kind: "error", text: `❌ **${title}**\n${error.message}` };
}

function handleFailure(
  context: VoiceCommandContext,
  error: unknown,
  fallback: VoiceOperation
): VoiceCommandReply {
  const voiceError = toVoiceCommandError(error, fallback);
  if (voiceError.kind === "BACKEND") {
    console.error(
      `[VOICE] ${voiceError.operation ?? fallback} failed guild=${context.guildId}:`,
      voiceError.cause ?? voiceError
    );
  } else {
    console.log(
      `[VOICE] ${voiceError.operation ?? fallback} rejected guild=${context.guildId} kind=${voiceError.kind}`
    );
  }
  return formatFailure(voiceError, fallback);
}

function describeConnection(result: ConnectionResult, channelName: string): VoiceCommandReply {
  if (result === "AlreadyPresent") {
    return { kind: "info", text: "ℹ️ すでにこのボイスチャンネルに接続しています。" };
  }
  const verb = result === "Moved" ? "移動しました" : "接続しました";
  return { kind: "success", text: `✅ \`${channelName}\` に${verb}。` };
}

export async function connectVoice(
  deps: VoiceServiceDeps,
  context: VoiceCommandContext
): Promise<VoiceCommandReply> {
  const fallback: VoiceOperation = deps.registry.get(context.guildId) ? "move" : "connect";
  const target = context.invokerChannel;
  if (!deps.checks.invokerIsConnected(context) || !target) {
    return handleFailure(
      context,
      new VoiceCommandError("INVALID_REQUEST", NOT_IN_VOICE_TEXT),
      fallback
    );
  }

  try {
    const outcome = await deps.registry.withSession(context.guildId, (handle) =>
      connectOrMove(deps, context, target, handle)
    );
    return describeConnection(outcome.result, target.name);
  } catch (error) {
    return handleFailure(context, error, fallback);
  }
}

export async function disconnectVoice(
  deps: VoiceServiceDeps,
  context: VoiceCommandContext
): Promise<VoiceCommandReply> {
  try {
    await deps.registry.withSession(context.guildId, (handle) =>
      disconnect(deps, context, handle)
    );
    return { kind: "success", text: "✅ 切断しました。" };
  } catch (error) {
    return handleFailure(context, error, "disconnect");
  }
}

export async function sayVoice(
  deps: VoiceServiceDeps,
  context: VoiceCommandContext,
  message: string
): Promise<VoiceCommandReply> {
  try {
    await deps.registry.withSession(context.guildId, (handle) =>
      speak(deps, context, message, handle)
    );
    return { kind: "success", text: "📣" };
  } catch (error) {
    return handleFailure(context, error, "speak");
  }
}

export function setVoiceProfile(
  deps: VoiceServiceDeps,
  context: VoiceCommandContext,
  voiceName: string
): VoiceCommandReply {
  try {
    const profile = deps.profiles.assign(context.invokerId, context.textChannelId, voiceName);
    return {
      kind: "success",
      text: `✅ このチャンネルでのボイスを「${profile.voiceName}」に設定しました。`,
    };
  } catch (error) {
    if (error instanceof VoiceCommandError) {
      return { kind: "error", text: `❌ ${error.message}` };
    }
    throw error;
  }
}

export function resetVoiceProfile(
  deps: VoiceServiceDeps,
  context: VoiceCommandContext
): VoiceCommandReply {
  deps.profiles.reset(context.invokerId, context.textChannelId);
  const profile = deps.profiles.resolve(context.invokerId, context.textChannelId);
  return {
    kind: "success",
    text: `✅ このチャンネルでのボイスを既定の「${profile.voiceName}」に戻しました。`,
  };
}

export function listVoiceProfiles(
  deps: VoiceServiceDeps,
  context: VoiceCommandContext
): VoiceCommandReply {
  const current = deps.profiles.resolve(context.invokerId, context.textChannelId).voiceName;
  const lines = deps.profiles.listVoices().map((voice) => {
    const marker = voice.name === current ? "▶" : "・";
    const description = voice.description ? ` - ${voice.description}` : "";
    return `${marker} \`${voice.name}\`${description}`;
  });
  return { kind: "info", text: ["利用できるボイス:", ...lines].join("\n") };
}

export type BotVoiceStateChange = "released" | "followed" | "unchanged";

// ボットが通話から外された（キック・チャンネル削除など）ときはセッションを破棄し、
// 他者に移動させられたときはセッションのチャンネルを追従させる。
export async function handleBotVoiceStateUpdate(
  deps: VoiceServiceDeps,
  guildId: string,
  channel: VoiceChannelRef | null
): Promise<BotVoiceStateChange> {
  return await deps.registry.withSession<BotVoiceStateChange>(guildId, async (handle) => {
    if (channel === null) {
      return (await releaseSession(handle)) ? "released" : "unchanged";
    }
    return followExternalMove(handle, channel) ? "followed" : "unchanged";
  });
}
