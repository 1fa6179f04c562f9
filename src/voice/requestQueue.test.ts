import assert from "node:assert/strict";
import { test } from "node:test";
import { AUDIO_QUEUE_LIMIT } from "../constants";
import {
  clearRequestQueue,
  createRequestQueueState,
  enqueueRequest,
  shiftRequest,
} from "./requestQueue";

test("enqueueRequest keeps FIFO order", () => {
  const state = createRequestQueueState<number>();
  assert.equal(enqueueRequest(state, 1), true);
  assert.equal(enqueueRequest(state, 2), true);
  assert.equal(shiftRequest(state), 1);
  assert.equal(shiftRequest(state), 2);
  assert.equal(shiftRequest(state), undefined);
});

test("enqueueRequest rejects when queue is full", () => {
  const state = createRequestQueueState<number>();
  for (let i = 0; i < AUDIO_QUEUE_LIMIT; i += 1) {
    assert.equal(enqueueRequest(state, i), true);
  }
  assert.equal(enqueueRequest(state, 999), false);
  assert.equal(state.items.length, AUDIO_QUEUE_LIMIT);
});

test("clearRequestQueue drops pending items", () => {
  const state = createRequestQueueState<string>();
  enqueueRequest(state, "a");
  enqueueRequest(state, "b");

  assert.equal(clearRequestQueue(state), 2);
  assert.equal(shiftRequest(state), undefined);
  assert.equal(enqueueRequest(state, "c", 1), true);
  assert.equal(enqueueRequest(state, "d", 1), false);
});
