// テスト用のインメモリ実装。Discordにもespeak-ngにも接続しない。
import type {
  AudioSource,
  SpeechRequest,
  VoiceBackend,
  VoiceChannelRef,
  VoiceCommandContext,
  VoiceLink,
} from "../types";

export function createChannel(
  id: string,
  overrides: Partial<VoiceChannelRef> = {}
): VoiceChannelRef {
  return {
    id,
    name: `${id}-name`,
    missingBotPermissions: [],
    humanMemberIds: [],
    ...overrides,
  };
}

export function createContext(overrides: Partial<VoiceCommandContext> = {}): VoiceCommandContext {
  return {
    guildId: "guild-1",
    textChannelId: "text-1",
    invokerId: "user-1",
    invokerChannel: createChannel("vc-1", { humanMemberIds: ["user-1"] }),
    invokerCanMoveMembers: false,
    botChannel: null,
    ...overrides,
  };
}

export class FakeVoiceLink implements VoiceLink {
  channelId: string;
  readonly calls: string[];
  readonly played: AudioSource[] = [];
  playing = false;
  failMove: Error | null = null;
  failDisconnect: Error | null = null;

  constructor(channelId: string, calls: string[] = []) {
    this.channelId = channelId;
    this.calls = calls;
  }

  async moveTo(channel: VoiceChannelRef): Promise<void> {
    this.calls.push(`move:${channel.id}`);
    if (this.failMove) {
      throw this.failMove;
    }
    this.channelId = channel.id;
    this.playing = false;
  }

  adoptChannel(channelId: string): void {
    this.calls.push(`adopt:${channelId}`);
    this.channelId = channelId;
  }

  async disconnect(): Promise<void> {
    this.calls.push("disconnect");
    if (this.failDisconnect) {
      throw this.failDisconnect;
    }
    this.playing = false;
  }

  isPlaying(): boolean {
    return this.playing;
  }

  play(source: AudioSource): void {
    this.calls.push("play");
    this.played.push(source);
    this.playing = true;
  }
}

export class FakeVoiceBackend implements VoiceBackend {
  readonly calls: string[] = [];
  readonly links: FakeVoiceLink[] = [];
  failConnect: Error | null = null;

  async connect(guildId: string, channel: VoiceChannelRef): Promise<FakeVoiceLink> {
    this.calls.push(`connect:${guildId}:${channel.id}`);
    await Promise.resolve();
    if (this.failConnect) {
      throw this.failConnect;
    }
    const link = new FakeVoiceLink(channel.id, this.calls);
    this.links.push(link);
    return link;
  }
}

export class FakeAudioSource implements AudioSource {
  readonly submitted: SpeechRequest[] = [];
  clearCount = 0;
  rejectWith: Error | null = null;
  private readonly listeners = new Set<() => void>();

  get pendingCount(): number {
    return this.submitted.length;
  }

  async submitRequest(request: SpeechRequest): Promise<void> {
    if (this.rejectWith) {
      throw this.rejectWith;
    }
    this.submitted.push(request);
  }

  clear(): void {
    this.submitted.length = 0;
    this.clearCount += 1;
    for (const listener of this.listeners) {
      listener();
    }
  }

  async read(): Promise<Buffer | null> {
    const request = this.submitted.shift();
    return request ? Buffer.from(request.text) : null;
  }

  onClear(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
