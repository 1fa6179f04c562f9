import assert from "node:assert/strict";
import { test } from "node:test";
import { MAX_MESSAGE_CHARS } from "../constants";
import { VoiceCommandError } from "../errors";
import {
  canDisconnect,
  hasRequiredPermissions,
  invokerIsConnected,
  messageIsValid,
} from "./checks";
import { createChannel, createContext } from "./voiceFakes";

function assertKind(task: () => void, kind: string, message?: string) {
  assert.throws(task, (error: unknown) => {
    assert.ok(error instanceof VoiceCommandError);
    assert.equal(error.kind, kind);
    if (message !== undefined) {
      assert.equal(error.message, message);
    }
    return true;
  });
}

test("canDisconnect allows an empty bot channel", () => {
  const context = createContext();
  assert.doesNotThrow(() => canDisconnect(context, createChannel("vc-2")));
});

test("canDisconnect allows the invoker sharing the bot channel", () => {
  const context = createContext();
  const current = createChannel("vc-2", { humanMemberIds: ["user-1", "user-2"] });
  assert.doesNotThrow(() => canDisconnect(context, current));
});

test("canDisconnect rejects when others use the bot channel", () => {
  const context = createContext();
  const current = createChannel("vc-2", { humanMemberIds: ["user-2"] });
  assertKind(
    () => canDisconnect(context, current),
    "PERMISSION",
    "`vc-2-name` で他のメンバーが使用中です。移動・切断には「メンバーを移動」権限が必要です。"
  );
});

test("canDisconnect lets members with MoveMembers through", () => {
  const context = createContext({ invokerCanMoveMembers: true });
  const current = createChannel("vc-2", { humanMemberIds: ["user-2"] });
  assert.doesNotThrow(() => canDisconnect(context, current));
});

test("canDisconnect prefers the live bot channel over the stored one", () => {
  const context = createContext({
    botChannel: createChannel("vc-2", { humanMemberIds: [] }),
  });
  const stale = createChannel("vc-2", { humanMemberIds: ["user-2"] });
  assert.doesNotThrow(() => canDisconnect(context, stale));
});

test("hasRequiredPermissions names the missing permissions", () => {
  const target = createChannel("vc-3", { missingBotPermissions: ["Connect", "Speak"] });
  assertKind(
    () => hasRequiredPermissions(createContext(), target),
    "PERMISSION",
    "`vc-3-name` でボットに必要な権限がありません: Connect, Speak"
  );
  assert.doesNotThrow(() => hasRequiredPermissions(createContext(), createChannel("vc-4")));
});

test("invokerIsConnected reflects the invoker voice channel", () => {
  assert.equal(invokerIsConnected(createContext()), true);
  assert.equal(invokerIsConnected(createContext({ invokerChannel: null })), false);
});

test("messageIsValid rejects blank and oversized messages", () => {
  const context = createContext();
  assertKind(() => messageIsValid(context, "   "), "VALIDATION", "読み上げるメッセージが空です。");
  assertKind(() => messageIsValid(context, "a".repeat(MAX_MESSAGE_CHARS + 1)), "VALIDATION");
  assert.doesNotThrow(() => messageIsValid(context, "a".repeat(MAX_MESSAGE_CHARS)));
});
