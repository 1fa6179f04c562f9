import { MAX_MESSAGE_CHARS } from "../constants";
import { VoiceCommandError } from "../errors";
import type { VoiceChannelRef, VoiceCommandContext, VoiceChecks } from "../types";

// 別チャンネルにいる人の通話を奪わないよう、移動・切断できる条件を確認する。
export function canDisconnect(context: VoiceCommandContext, current: VoiceChannelRef): void {
  if (context.invokerCanMoveMembers) {
    return;
  }
  const channel = context.botChannel ?? current;
  const others = channel.humanMemberIds.filter((id) => id !== context.invokerId);
  if (channel.humanMemberIds.includes(context.invokerId) || others.length === 0) {
    return;
  }
  throw new VoiceCommandError(
    "PERMISSION",
    `\`${channel.name}\` で他のメンバーが使用中です。移動・切断には「メンバーを移動」権限が必要です。`
  );
}

export function hasRequiredPermissions(
  _context: VoiceCommandContext,
  target: VoiceChannelRef
): void {
  if (target.missingBotPermissions.length === 0) {
    return;
  }
  throw new VoiceCommandError(
    "PERMISSION",
    `\`${target.name}\` でボットに必要な権限がありません: ${target.missingBotPermissions.join(", ")}`
  );
}

export function invokerIsConnected(context: VoiceCommandContext): boolean {
  return context.invokerChannel !== null;
}

export function messageIsValid(_context: VoiceCommandContext, message: string): void {
  const trimmed = message.trim();
  if (trimmed.length === 0) {
    throw new VoiceCommandError("VALIDATION", "読み上げるメッセージが空です。");
  }
  if (trimmed.length > MAX_MESSAGE_CHARS) {
    throw new VoiceCommandError(
      "VALIDATION",
      `メッセージは${MAX_MESSAGE_CHARS}文字以内にしてください。`
    );
  }
}

export const defaultVoiceChecks: VoiceChecks = {
  canDisconnect,
  hasRequiredPermissions,
  invokerIsConnected,
  messageIsValid,
};
