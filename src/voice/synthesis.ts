import { spawn } from "child_process";
import { Semaphore } from "async-mutex";
import { BASE_WORDS_PER_MINUTE, TTS_TIMEOUT_SEC } from "../constants";
import type { SpeechRequest } from "../types";
import { withTimeout } from "../utils/async";
import { resolveEspeakBin } from "./ttsConfig";

// signalが中断されたら、合成中のプロセスも止める。
export type SpeechSynthesizer = (request: SpeechRequest, signal: AbortSignal) => Promise<Buffer>;

const MIN_WORDS_PER_MINUTE = 80;
const MAX_WORDS_PER_MINUTE = 450;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// 本文は引数ではなく標準入力で渡す（先頭が"-"のメッセージ対策）。
export function buildEspeakArgs(request: SpeechRequest): string[] {
  const wordsPerMinute = clamp(
    Math.round(BASE_WORDS_PER_MINUTE * request.speed),
    MIN_WORDS_PER_MINUTE,
    MAX_WORDS_PER_MINUTE
  );
  const pitch = clamp(Math.round(request.pitch), 0, 99);
  return [
    "--stdout",
    "--stdin",
    "-v",
    request.language,
    "-s",
    String(wordsPerMinute),
    "-p",
    String(pitch),
  ];
}

// 子プロセスに標準入力を渡し、標準出力をまとめて返す。中断時はkillし、終了を待って拒否する。
export function runSynthesisProcess(
  bin: string,
  args: string[],
  input: string,
  signal: AbortSignal
): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("音声合成を中断しました。"));
      return;
    }

    const child = spawn(bin, args, { windowsHide: true });
    const chunks: Buffer[] = [];
    const errorChunks: Buffer[] = [];
    let settled = false;
    let aborted = false;
    const settle = (finish: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      signal.removeEventListener("abort", onAbort);
      finish();
    };
    const onAbort = () => {
      aborted = true;
      child.kill();
    };
    signal.addEventListener("abort", onAbort, { once: true });

    child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => errorChunks.push(chunk));
    child.stdin.on("error", (error) => {
      console.warn(`[TTS] stdin error: ${error.message}`);
    });
    child.on("error", (error) => {
      settle(() =>
        reject(new Error(`音声合成プロセスを起動できませんでした: ${bin}\n${error.message}`))
      );
    });
    child.on("close", (code) => {
      if (aborted) {
        settle(() => reject(new Error("音声合成を中断しました。")));
        return;
      }
      if (code === 0) {
        settle(() => resolve(Buffer.concat(chunks)));
        return;
      }
      const detail = Buffer.concat(errorChunks).toString("utf-8").trim();
      settle(() => reject(new Error(`音声合成に失敗しました code=${code ?? "null"} ${detail}`.trim())));
    });
    child.stdin.end(input, "utf-8");
  });
}

// espeak-ngを起動してWAVを標準出力から受け取る。
export function createEspeakSynthesizer(bin = resolveEspeakBin()): SpeechSynthesizer {
  return async (request, signal) =>
    await runSynthesisProcess(bin, buildEspeakArgs(request), request.text, signal);
}

// 全ギルドで共有する合成プロセス枠。同時実行数を制限する。
export class SynthesisPool {
  private readonly semaphore: Semaphore;
  private readonly synthesizer: SpeechSynthesizer;
  private readonly timeoutMs: number;

  constructor(synthesizer: SpeechSynthesizer, size: number, timeoutMs = TTS_TIMEOUT_SEC * 1000) {
    this.synthesizer = synthesizer;
    this.semaphore = new Semaphore(size);
    this.timeoutMs = timeoutMs;
  }

  async synthesize(request: SpeechRequest): Promise<Buffer> {
    return await this.semaphore.runExclusive(async () => {
      const controller = new AbortController();
      try {
        return await withTimeout(
          () => this.synthesizer(request, controller.signal),
          this.timeoutMs,
          "音声合成がタイムアウトしました。"
        );
      } finally {
        // タイムアウト後も動き続けるプロセスが枠の外に残らないようにする。
        controller.abort();
      }
    });
  }
}
