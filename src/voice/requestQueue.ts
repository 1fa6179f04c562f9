import { AUDIO_QUEUE_LIMIT } from "../constants";

export type RequestQueueState<T> = {
  items: T[];
};

// 読み上げ要求を積むFIFOキューの状態を作る。
export function createRequestQueueState<T>(): RequestQueueState<T> {
  return { items: [] };
}

// キューに追加できたかどうかを返し、上限超過時は追加しない。
export function enqueueRequest<T>(
  state: RequestQueueState<T>,
  item: T,
  limit = AUDIO_QUEUE_LIMIT
): boolean {
  if (state.items.length >= limit) {
    return false;
  }
  state.items.push(item);
  return true;
}

// 先頭要素を取り出してFIFOで処理する。
export function shiftRequest<T>(state: RequestQueueState<T>): T | undefined {
  return state.items.shift();
}

// 待機中の要求をすべて捨て、捨てた件数を返す。
export function clearRequestQueue<T>(state: RequestQueueState<T>): number {
  const dropped = state.items.length;
  state.items = [];
  return dropped;
}
