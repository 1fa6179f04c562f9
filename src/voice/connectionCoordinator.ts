import { VoiceCommandError, toVoiceCommandError } from "../errors";
import type { SessionHandle } from "../state";
import type {
  ConnectionResult,
  VoiceBackend,
  VoiceChannelRef,
  VoiceChecks,
  VoiceCommandContext,
  VoiceOperation,
  VoiceSession,
} from "../types";

export type CoordinatorDeps = {
  backend: VoiceBackend;
  checks: VoiceChecks;
};

export type ConnectionOutcome = {
  result: ConnectionResult;
  session: VoiceSession;
};

async function runStep<T>(operation: VoiceOperation, step: () => T | Promise<T>): Promise<T> {
  try {
    return await step();
  } catch (error) {
    throw toVoiceCommandError(error, operation);
  }
}

// 呼び出し側がギルドのロックを保持している前提。セッションの更新は全チェック通過後にのみ行う。
export async function connectOrMove(
  deps: CoordinatorDeps,
  context: VoiceCommandContext,
  target: VoiceChannelRef,
  handle: SessionHandle
): Promise<ConnectionOutcome> {
  const current = handle.get();

  if (!current) {
    await runStep("connect", () => deps.checks.hasRequiredPermissions(context, target));
    const link = await runStep("connect", () => deps.backend.connect(context.guildId, target));
    const session: VoiceSession = {
      guildId: context.guildId,
      channel: target,
      link,
      player: null,
    };
    handle.commit(session);
    console.log(`[VOICE] connected guild=${context.guildId} channel=${target.id}`);
    return { result: "Connected", session };
  }

  if (current.channel.id === target.id) {
    return { result: "AlreadyPresent", session: current };
  }

  await runStep("move", () => deps.checks.canDisconnect(context, current.channel));
  await runStep("move", () => deps.checks.hasRequiredPermissions(context, target));

  // 移動先で古い音声が流れないよう、移動前にキューと再生中の音声を捨てる。
  current.player?.source.clear();
  await runStep("move", () => current.link.moveTo(target));

  const session: VoiceSession = { ...current, channel: target, player: null };
  handle.commit(session);
  console.log(
    `[VOICE] moved guild=${context.guildId} from=${current.channel.id} to=${target.id}`
  );
  return { result: "Moved", session };
}

export async function disconnect(
  deps: CoordinatorDeps,
  context: VoiceCommandContext,
  handle: SessionHandle
): Promise<void> {
  const current = handle.get();
  if (!current) {
    throw new VoiceCommandError(
      "NOT_CONNECTED",
      "ボイスチャンネルに接続していません。",
      "disconnect"
    );
  }

  await runStep("disconnect", () => deps.checks.canDisconnect(context, current.channel));
  current.player?.source.clear();
  await runStep("disconnect", () => current.link.disconnect());
  handle.commit(null);
  console.log(`[VOICE] disconnected guild=${context.guildId} channel=${current.channel.id}`);
}

// ボットが外部要因で通話から外れたとき、残ったセッションを片付ける。
export async function releaseSession(handle: SessionHandle): Promise<boolean> {
  const current = handle.get();
  if (!current) {
    return false;
  }
  current.player?.source.clear();
  handle.commit(null);
  try {
    await current.link.disconnect();
  } catch (error) {
    console.warn(`[VOICE] release disconnect error guild=${handle.guildId}:`, error);
  }
  console.log(`[VOICE] session released guild=${handle.guildId}`);
  return true;
}

// 他者にボットを別チャンネルへ移動させられたとき、セッションを新しいチャンネルに合わせる。
// 移動時と同様に読み上げ待ちは破棄する。
export function followExternalMove(handle: SessionHandle, channel: VoiceChannelRef): boolean {
  const current = handle.get();
  if (!current || current.channel.id === channel.id) {
    return false;
  }
  current.player?.source.clear();
  current.link.adoptChannel(channel.id);
  handle.commit({ ...current, channel, player: null });
  console.log(
    `[VOICE] moved externally guild=${handle.guildId} from=${current.channel.id} to=${channel.id}`
  );
  return true;
}
