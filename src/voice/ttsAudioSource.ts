import { AUDIO_QUEUE_LIMIT } from "../constants";
import { VoiceCommandError } from "../errors";
import type { AudioSource, SpeechRequest } from "../types";
import {
  type RequestQueueState,
  clearRequestQueue,
  createRequestQueueState,
  enqueueRequest,
  shiftRequest,
} from "./requestQueue";
import type { SynthesisPool } from "./synthesis";

// 読み上げ要求のFIFOを持ち、再生ループから呼ばれるたびに1件ずつ合成して返す。
export class TtsAudioSource implements AudioSource {
  private readonly pool: SynthesisPool;
  private readonly limit: number;
  private readonly queue: RequestQueueState<SpeechRequest> = createRequestQueueState();
  private readonly clearListeners = new Set<() => void>();
  // clearのたびに進め、合成中だった音声を破棄する目印にする。
  private generation = 0;

  constructor(pool: SynthesisPool, limit = AUDIO_QUEUE_LIMIT) {
    this.pool = pool;
    this.limit = limit;
  }

  get pendingCount(): number {
    return this.queue.items.length;
  }

  async submitRequest(request: SpeechRequest): Promise<void> {
    if (!enqueueRequest(this.queue, request, this.limit)) {
      throw new VoiceCommandError(
        "QUEUE_FULL",
        `読み上げ待ちが上限（${this.limit}件）に達しています。しばらく待ってから再度試してください。`
      );
    }
  }

  async read(): Promise<Buffer | null> {
    for (;;) {
      const request = shiftRequest(this.queue);
      if (!request) {
        return null;
      }
      const generation = this.generation;
      const audio = await this.pool.synthesize(request);
      if (generation === this.generation) {
        return audio;
      }
    }
  }

  clear(): void {
    const dropped = clearRequestQueue(this.queue);
    this.generation += 1;
    if (dropped > 0) {
      console.log(`[TTS] queue cleared dropped=${dropped}`);
    }
    for (const listener of this.clearListeners) {
      listener();
    }
  }

  onClear(listener: () => void): () => void {
    this.clearListeners.add(listener);
    return () => {
      this.clearListeners.delete(listener);
    };
  }
}
