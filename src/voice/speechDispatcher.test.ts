import assert from "node:assert/strict";
import { test } from "node:test";
import { VoiceCommandError } from "../errors";
import { VoiceSessionRegistry } from "../state";
import type { VoiceCommandContext } from "../types";
import { defaultVoiceChecks } from "./checks";
import { type DispatcherDeps, speak } from "./speechDispatcher";
import { VoiceProfileRegistry } from "./voiceProfiles";
import { FakeAudioSource, FakeVoiceBackend, createChannel, createContext } from "./voiceFakes";

function setup() {
  const backend = new FakeVoiceBackend();
  const sources: FakeAudioSource[] = [];
  const deps: DispatcherDeps = {
    backend,
    checks: defaultVoiceChecks,
    profiles: new VoiceProfileRegistry([
      { name: "default", language: "en", speed: 1, pitch: 50 },
      { name: "ja", language: "ja", speed: 1.2, pitch: 40 },
    ]),
    createSource: () => {
      const source = new FakeAudioSource();
      sources.push(source);
      return source;
    },
  };
  const registry = new VoiceSessionRegistry();
  const say = (message: string, context: VoiceCommandContext = createContext()) =>
    registry.withSession(context.guildId, (handle) => speak(deps, context, message, handle));
  return { backend, sources, deps, registry, say };
}

function expectVoiceError(kind: string, operation: string) {
  return (error: unknown) => {
    assert.ok(error instanceof VoiceCommandError);
    assert.equal(error.kind, kind);
    assert.equal(error.operation, operation);
    return true;
  };
}

test("speak connects, creates a source, submits and starts playback", async () => {
  const env = setup();

  await env.say("hello");

  assert.deepEqual(env.backend.calls, ["connect:guild-1:vc-1", "play"]);
  assert.equal(env.sources.length, 1);
  assert.deepEqual(
    env.sources[0].submitted.map((request) => request.text),
    ["hello"]
  );
  const session = env.registry.get("guild-1");
  assert.equal(session?.player?.source, env.sources[0]);
  assert.equal(session?.link.isPlaying(), true);
});

test("speak queues behind the current playback without a second source", async () => {
  const env = setup();

  await env.say("first");
  await env.say("second");

  assert.equal(env.sources.length, 1);
  assert.deepEqual(env.backend.calls, ["connect:guild-1:vc-1", "play"]);
  assert.deepEqual(
    env.sources[0].submitted.map((request) => request.text),
    ["first", "second"]
  );
});

test("concurrent speak calls on an absent session share one source", async () => {
  const env = setup();

  await Promise.all([env.say("one"), env.say("two")]);

  assert.equal(env.sources.length, 1);
  assert.equal(env.backend.links.length, 1);
  assert.deepEqual(
    env.sources[0].submitted.map((request) => request.text),
    ["one", "two"]
  );
});

test("concurrent submitters are delivered in submission order", async () => {
  const env = setup();
  const texts = ["a", "b", "c", "d", "e"];

  await Promise.all(texts.map((text) => env.say(text)));

  const source = env.sources[0];
  const delivered: string[] = [];
  for (let chunk = await source.read(); chunk !== null; chunk = await source.read()) {
    delivered.push(chunk.toString());
  }
  assert.deepEqual(delivered, texts);
});

test("speak restarts playback on the existing source once it went idle", async () => {
  const env = setup();
  await env.say("first");
  env.backend.links[0].playing = false;

  await env.say("second");

  assert.equal(env.sources.length, 1);
  assert.deepEqual(env.backend.calls, ["connect:guild-1:vc-1", "play", "play"]);
  assert.equal(env.backend.links[0].played[1], env.sources[0]);
});

test("speak moves to the invoker channel and drops stale audio", async () => {
  const env = setup();
  await env.say("old", createContext({ invokerChannel: createChannel("vc-2") }));

  await env.say("new");

  assert.deepEqual(env.backend.calls, ["connect:guild-1:vc-2", "play", "move:vc-1", "play"]);
  assert.equal(env.sources.length, 2);
  assert.equal(env.sources[0].clearCount, 1);
  assert.deepEqual(env.sources[0].submitted, []);
  assert.deepEqual(
    env.sources[1].submitted.map((request) => request.text),
    ["new"]
  );
  assert.equal(env.registry.get("guild-1")?.channel.id, "vc-1");
});

test("speak uses the invoker voice profile for the text channel", async () => {
  const env = setup();
  env.deps.profiles.assign("user-1", "text-1", "ja");

  await env.say("こんにちは");

  assert.deepEqual(env.sources[0].submitted[0], {
    text: "こんにちは",
    voiceName: "ja",
    language: "ja",
    speed: 1.2,
    pitch: 40,
  });
});

test("speak rejects invokers outside voice channels", async () => {
  const env = setup();

  await assert.rejects(
    () => env.say("hello", createContext({ invokerChannel: null })),
    expectVoiceError("INVALID_REQUEST", "speak")
  );
  assert.deepEqual(env.backend.calls, []);
});

test("speak rejects invalid messages before connecting", async () => {
  const env = setup();

  await assert.rejects(() => env.say("   "), expectVoiceError("VALIDATION", "speak"));
  assert.deepEqual(env.backend.calls, []);
});

test("speak propagates connect failures without touching a source", async () => {
  const env = setup();
  const context = createContext({
    invokerChannel: createChannel("vc-1", { missingBotPermissions: ["Connect"] }),
  });

  await assert.rejects(() => env.say("hello", context), expectVoiceError("PERMISSION", "connect"));
  assert.equal(env.sources.length, 0);
  assert.equal(env.registry.get("guild-1"), null);
});

test("speak leaves no orphaned player when the queue is full", async () => {
  const env = setup();
  env.deps.createSource = () => {
    const source = new FakeAudioSource();
    source.rejectWith = new VoiceCommandError("QUEUE_FULL", "いっぱいです。");
    env.sources.push(source);
    return source;
  };

  await assert.rejects(() => env.say("hello"), expectVoiceError("QUEUE_FULL", "speak"));

  const session = env.registry.get("guild-1");
  assert.equal(session?.channel.id, "vc-1");
  assert.equal(session?.player, null);
  assert.deepEqual(env.backend.calls, ["connect:guild-1:vc-1"]);
});
