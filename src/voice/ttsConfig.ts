import { DEFAULT_TTS_POOL_SIZE } from "../constants";

// 音声合成に使うespeak-ngの実行ファイル。PATH上のものを既定にする。
export function resolveEspeakBin(): string {
  const raw = process.env.ESPEAK_BIN?.trim();
  return raw && raw.length > 0 ? raw : "espeak-ng";
}

export function resolveTtsPoolSize(): number {
  const parsed = Number.parseInt(process.env.TTS_POOL_SIZE ?? "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_TTS_POOL_SIZE;
}
