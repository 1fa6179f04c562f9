import { DEFAULT_VOICE_NAME } from "../constants";
import { VoiceCommandError } from "../errors";
import type { SpeechRequest, VoiceDefinition, VoiceProfile } from "../types";

function profileKey(userId: string, channelId: string): string {
  return `${userId}:${channelId}`;
}

// (ユーザー, テキストチャンネル) ごとのボイス割り当て。メモリ上のみで保持する。
export class VoiceProfileRegistry {
  private readonly voices: Map<string, VoiceDefinition>;
  private readonly assignments = new Map<string, string>();
  private readonly defaultVoiceName: string;

  constructor(voices: VoiceDefinition[], defaultVoiceName = DEFAULT_VOICE_NAME) {
    this.voices = new Map(voices.map((voice) => [voice.name.toLowerCase(), voice]));
    if (!this.voices.has(defaultVoiceName.toLowerCase())) {
      throw new Error(`既定ボイスが定義されていません: ${defaultVoiceName}`);
    }
    this.defaultVoiceName = defaultVoiceName;
  }

  listVoices(): VoiceDefinition[] {
    return [...this.voices.values()];
  }

  assign(userId: string, channelId: string, voiceName: string): VoiceProfile {
    const voice = this.voices.get(voiceName.trim().toLowerCase());
    if (!voice) {
      throw new VoiceCommandError("VALIDATION", `ボイス「${voiceName}」は見つかりません。`);
    }
    this.assignments.set(profileKey(userId, channelId), voice.name);
    return toProfile(voice);
  }

  reset(userId: string, channelId: string): void {
    this.assignments.delete(profileKey(userId, channelId));
  }

  resolve(userId: string, channelId: string): VoiceProfile {
    const assigned = this.assignments.get(profileKey(userId, channelId));
    const voice =
      (assigned ? this.voices.get(assigned.toLowerCase()) : undefined) ??
      this.voices.get(this.defaultVoiceName.toLowerCase());
    if (!voice) {
      throw new Error(`既定ボイスが定義されていません: ${this.defaultVoiceName}`);
    }
    return toProfile(voice);
  }
}

function toProfile(voice: VoiceDefinition): VoiceProfile {
  return {
    voiceName: voice.name,
    language: voice.language,
    speed: voice.speed,
    pitch: voice.pitch,
  };
}

export function buildSpeechRequest(message: string, profile: VoiceProfile): SpeechRequest {
  return Object.freeze({
    text: message.replace(/\s+/g, " ").trim(),
    voiceName: profile.voiceName,
    language: profile.language,
    speed: profile.speed,
    pitch: profile.pitch,
  });
}
