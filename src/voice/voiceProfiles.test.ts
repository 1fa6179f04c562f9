import assert from "node:assert/strict";
import { test } from "node:test";
import { VoiceCommandError } from "../errors";
import type { VoiceDefinition } from "../types";
import { VoiceProfileRegistry, buildSpeechRequest } from "./voiceProfiles";

const voices: VoiceDefinition[] = [
  { name: "default", language: "en", speed: 1, pitch: 50 },
  { name: "Ja", language: "ja", speed: 1.1, pitch: 40 },
];

test("resolve falls back to the default voice", () => {
  const registry = new VoiceProfileRegistry(voices);

  assert.deepEqual(registry.resolve("user-1", "text-1"), {
    voiceName: "default",
    language: "en",
    speed: 1,
    pitch: 50,
  });
});

test("assign is scoped to the user and text channel", () => {
  const registry = new VoiceProfileRegistry(voices);
  const profile = registry.assign("user-1", "text-1", " ja ");

  assert.equal(profile.voiceName, "Ja");
  assert.equal(registry.resolve("user-1", "text-1").voiceName, "Ja");
  assert.equal(registry.resolve("user-1", "text-2").voiceName, "default");
  assert.equal(registry.resolve("user-2", "text-1").voiceName, "default");

  registry.reset("user-1", "text-1");
  assert.equal(registry.resolve("user-1", "text-1").voiceName, "default");
});

test("assign rejects unknown voices", () => {
  const registry = new VoiceProfileRegistry(voices);

  assert.throws(
    () => registry.assign("user-1", "text-1", "robot"),
    (error: unknown) => {
      assert.ok(error instanceof VoiceCommandError);
      assert.equal(error.kind, "VALIDATION");
      assert.equal(error.message, "ボイス「robot」は見つかりません。");
      return true;
    }
  );
});

test("constructor requires the default voice", () => {
  assert.throws(
    () => new VoiceProfileRegistry([{ name: "ja", language: "ja", speed: 1, pitch: 50 }]),
    /既定ボイスが定義されていません: default/
  );
});

test("buildSpeechRequest collapses whitespace and freezes the request", () => {
  const registry = new VoiceProfileRegistry(voices);
  const request = buildSpeechRequest("  hello \n  world ", registry.resolve("user-1", "text-1"));

  assert.deepEqual(request, {
    text: "hello world",
    voiceName: "default",
    language: "en",
    speed: 1,
    pitch: 50,
  });
  assert.equal(Object.isFrozen(request), true);
});
