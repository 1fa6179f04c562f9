import fs from "fs";
import path from "path";
import { DEFAULT_VOICE_NAME } from "./constants";
import type { VoiceDefinition } from "./types";

const voicesPath = path.resolve(process.cwd(), "data", "voices.json");
let cachedVoices: VoiceDefinition[] | null = null;

const fallbackVoice: VoiceDefinition = {
  name: DEFAULT_VOICE_NAME,
  language: "en",
  speed: 1,
  pitch: 50,
};

function isVoiceDefinition(value: unknown): value is VoiceDefinition {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.name === "string" &&
    record.name.trim().length > 0 &&
    typeof record.language === "string" &&
    typeof record.speed === "number" &&
    record.speed > 0 &&
    typeof record.pitch === "number" &&
    (record.description === undefined || typeof record.description === "string")
  );
}

// 不正な要素は読み飛ばし、既定ボイスが無ければ補う。
export function parseVoices(raw: string): VoiceDefinition[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    console.warn("[TTS] voices.json parse error:", error);
    return [fallbackVoice];
  }
  const voices = Array.isArray(parsed) ? parsed.filter(isVoiceDefinition) : [];
  if (!voices.some((voice) => voice.name === DEFAULT_VOICE_NAME)) {
    voices.unshift(fallbackVoice);
  }
  return voices;
}

function readVoices(): VoiceDefinition[] {
  try {
    return parseVoices(fs.readFileSync(voicesPath, "utf-8"));
  } catch (error) {
    console.warn(`[TTS] voices.json not loaded path=${voicesPath}`, error);
    return [fallbackVoice];
  }
}

export function getVoices(): VoiceDefinition[] {
  if (cachedVoices === null) {
    cachedVoices = readVoices();
  }
  return cachedVoices;
}
