import type { VoiceOperation } from "./types";

export type VoiceErrorKind =
  | "PERMISSION"
  | "NOT_CONNECTED"
  | "INVALID_REQUEST"
  | "VALIDATION"
  | "QUEUE_FULL"
  | "BACKEND";

// 種別と操作で分岐できるように、エラーは1クラスにまとめる。
export class VoiceCommandError extends Error {
  readonly kind: VoiceErrorKind;
  readonly operation: VoiceOperation | null;

  constructor(
    kind: VoiceErrorKind,
    message: string,
    operation: VoiceOperation | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "VoiceCommandError";
    this.kind = kind;
    this.operation = operation;
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// 不明なエラーはBACKEND扱いにし、操作が未設定なら付与する。
export function toVoiceCommandError(
  error: unknown,
  operation: VoiceOperation
): VoiceCommandError {
  if (error instanceof VoiceCommandError) {
    if (error.operation !== null) {
      return error;
    }
    return new VoiceCommandError(error.kind, error.message, operation, { cause: error });
  }
  return new VoiceCommandError(
    "BACKEND",
    `ボイスサーバーとの通信に失敗しました。\n${describeError(error)}`,
    operation,
    { cause: error }
  );
}
