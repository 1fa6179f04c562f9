import type { AudioSource } from "../types";

// 1クリップを再生し終えるまで待てる出力先。
export type ClipPlayer = {
  playClip(audio: Buffer): Promise<void>;
  stop(): void;
};

type Playback = {
  source: AudioSource;
  unsubscribe: () => void;
};

// 音源から合成済みクリップを順に取り出して流す。clearされたら即座に止める。
export class PlaybackLoop {
  private readonly player: ClipPlayer;
  private readonly guildId: string;
  private playback: Playback | null = null;
  private draining: Promise<void> = Promise.resolve();

  constructor(player: ClipPlayer, guildId: string) {
    this.player = player;
    this.guildId = guildId;
  }

  isPlaying(): boolean {
    return this.playback !== null;
  }

  play(source: AudioSource): void {
    if (this.playback) {
      this.stop();
    }
    const playback: Playback = { source, unsubscribe: () => undefined };
    playback.unsubscribe = source.onClear(() => {
      if (this.playback === playback) {
        this.stop();
      }
    });
    this.playback = playback;
    this.draining = this.drain(playback).catch((error) => {
      console.error(`[VOICE] playback loop error guild=${this.guildId}:`, error);
    });
  }

  stop(): void {
    const current = this.playback;
    this.playback = null;
    current?.unsubscribe();
    this.player.stop();
  }

  // 直近に始めた再生ループが終わるまで待つ。
  async whenIdle(): Promise<void> {
    await this.draining;
  }

  private async drain(playback: Playback): Promise<void> {
    try {
      while (this.playback === playback) {
        let audio: Buffer | null;
        try {
          audio = await playback.source.read();
        } catch (error) {
          console.error(`[TTS] synthesis error guild=${this.guildId}:`, error);
          continue;
        }
        if (this.playback !== playback) {
          break;
        }
        if (audio === null) {
          // read完了からここまでの間に積まれた要求は拾って続ける。
          if (playback.source.pendingCount > 0) {
            continue;
          }
          break;
        }
        try {
          await this.player.playClip(audio);
        } catch (error) {
          console.error(`[VOICE] 音声再生エラー guild=${this.guildId}:`, error);
        }
      }
    } finally {
      playback.unsubscribe();
      if (this.playback === playback) {
        this.playback = null;
      }
    }
  }
}
