// 読み上げメッセージの最大文字数。
export const MAX_MESSAGE_CHARS = 300;
// 1ギルドの音声キューに積める読み上げ要求の上限。
export const AUDIO_QUEUE_LIMIT = 10;

// ボイス接続がReadyになるまで待つ最大ミリ秒。
export const VOICE_READY_TIMEOUT_MS = 10_000;
// 音声合成のタイムアウト秒数。
export const TTS_TIMEOUT_SEC = 12;
// 同時に走らせる音声合成プロセス数の既定値。
export const DEFAULT_TTS_POOL_SIZE = 2;

// プロフィール未登録時に使うボイス名。
export const DEFAULT_VOICE_NAME = "default";
// espeak-ngの標準読み上げ速度（words per minute）。
export const BASE_WORDS_PER_MINUTE = 175;

// 接続・読み上げに必要なボットの権限。
export const REQUIRED_VOICE_PERMISSIONS = ["ViewChannel", "Connect", "Speak"] as const;
