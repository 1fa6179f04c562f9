import assert from "node:assert/strict";
import { test } from "node:test";
import { getVoices, parseVoices } from "./voices";

test("parseVoices keeps valid entries and skips broken ones", () => {
  const voices = parseVoices(
    JSON.stringify([
      { name: "default", language: "en", speed: 1, pitch: 50 },
      { name: "ja", language: "ja", speed: 1.1, pitch: 40, description: "Japanese" },
      { name: "", language: "en", speed: 1, pitch: 50 },
      { name: "broken", language: "en", speed: "fast", pitch: 50 },
      "not-a-voice",
    ])
  );

  assert.deepEqual(
    voices.map((voice) => voice.name),
    ["default", "ja"]
  );
});

test("parseVoices adds the default voice when missing", () => {
  const voices = parseVoices(JSON.stringify([{ name: "fr", language: "fr", speed: 1, pitch: 50 }]));

  assert.deepEqual(
    voices.map((voice) => voice.name),
    ["default", "fr"]
  );
  assert.deepEqual(voices[0], { name: "default", language: "en", speed: 1, pitch: 50 });
});

test("parseVoices falls back on invalid JSON", () => {
  assert.deepEqual(
    parseVoices("{").map((voice) => voice.name),
    ["default"]
  );
});

test("getVoices loads data/voices.json", () => {
  const names = getVoices().map((voice) => voice.name);
  assert.equal(names[0], "default");
  assert.ok(names.includes("ja"));
});
