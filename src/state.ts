import { Mutex } from "async-mutex";
import type { VoiceSession } from "./types";

// ロック中の処理だけがセッションを読み書きできるハンドル。
export type SessionHandle = {
  readonly guildId: string;
  get(): VoiceSession | null;
  commit(session: VoiceSession | null): void;
};

type GuildVoiceEntry = {
  mutex: Mutex;
  session: VoiceSession | null;
};

// ギルドごとのボイスセッションと排他ロックを保持する。
export class VoiceSessionRegistry {
  private readonly entries = new Map<string, GuildVoiceEntry>();

  get(guildId: string): VoiceSession | null {
    return this.entries.get(guildId)?.session ?? null;
  }

  isLocked(guildId: string): boolean {
    return this.entries.get(guildId)?.mutex.isLocked() ?? false;
  }

  // 接続・移動・切断・読み上げはギルド単位で直列に実行する。
  async withSession<T>(guildId: string, task: (handle: SessionHandle) => Promise<T>): Promise<T> {
    const entry = this.getOrCreateEntry(guildId);
    return await entry.mutex.runExclusive(async () => {
      const handle: SessionHandle = {
        guildId,
        get: () => entry.session,
        commit: (session) => {
          entry.session = session;
        },
      };
      return await task(handle);
    });
  }

  private getOrCreateEntry(guildId: string): GuildVoiceEntry {
    const existing = this.entries.get(guildId);
    if (existing) {
      return existing;
    }

    const entry: GuildVoiceEntry = { mutex: new Mutex(), session: null };
    this.entries.set(guildId, entry);
    return entry;
  }
}
