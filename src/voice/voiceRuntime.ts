import type { Client } from "discord.js";
import { VoiceSessionRegistry } from "../state";
import { getVoices } from "../voices";
import { defaultVoiceChecks } from "./checks";
import { createDiscordVoiceBackend } from "./discordVoiceBackend";
import { SynthesisPool, createEspeakSynthesizer } from "./synthesis";
import { resolveTtsPoolSize } from "./ttsConfig";
import { TtsAudioSource } from "./ttsAudioSource";
import { VoiceProfileRegistry } from "./voiceProfiles";
import type { VoiceServiceDeps } from "./voiceService";

let runtime: VoiceServiceDeps | null = null;

// Botの起動時に1回だけ作る。合成プロセス枠は全ギルドで共有する。
export function initVoiceRuntime(client: Client): VoiceServiceDeps {
  const pool = new SynthesisPool(createEspeakSynthesizer(), resolveTtsPoolSize());
  runtime = {
    registry: new VoiceSessionRegistry(),
    backend: createDiscordVoiceBackend(client),
    checks: defaultVoiceChecks,
    profiles: new VoiceProfileRegistry(getVoices()),
    createSource: () => new TtsAudioSource(pool),
  };
  return runtime;
}

export function getVoiceRuntime(): VoiceServiceDeps {
  if (!runtime) {
    throw new Error("ボイス機能が初期化されていません。");
  }
  return runtime;
}
