export type VoiceOperation = "connect" | "move" | "disconnect" | "speak";

export type ConnectionResult = "Connected" | "Moved" | "AlreadyPresent";

export type VoiceChannelRef = {
  id: string;
  name: string;
  // コマンド実行時点でボットに足りない権限名。
  missingBotPermissions: string[];
  humanMemberIds: string[];
};

export type VoiceCommandContext = {
  guildId: string;
  textChannelId: string;
  invokerId: string;
  invokerChannel: VoiceChannelRef | null;
  invokerCanMoveMembers: boolean;
  // ボットが実際にいるチャンネル（Discord側の最新状態）。
  botChannel: VoiceChannelRef | null;
};

export type VoiceParameters = {
  language: string;
  speed: number;
  pitch: number;
};

export type VoiceDefinition = VoiceParameters & {
  name: string;
  description?: string;
};

export type VoiceProfile = VoiceParameters & {
  voiceName: string;
};

export type SpeechRequest = Readonly<{
  text: string;
  voiceName: string;
  language: string;
  speed: number;
  pitch: number;
}>;

export interface AudioSource {
  submitRequest(request: SpeechRequest): Promise<void>;
  // 待機中と合成中の音声をまとめて捨てる。
  clear(): void;
  // 次に再生する音声。キューが空ならnull。
  read(): Promise<Buffer | null>;
  readonly pendingCount: number;
  onClear(listener: () => void): () => void;
}

export interface VoiceLink {
  readonly channelId: string;
  moveTo(channel: VoiceChannelRef): Promise<void>;
  // 他者に移動させられたとき、接続先の記録だけを合わせる。
  adoptChannel(channelId: string): void;
  disconnect(): Promise<void>;
  isPlaying(): boolean;
  play(source: AudioSource): void;
}

export interface VoiceBackend {
  connect(guildId: string, channel: VoiceChannelRef): Promise<VoiceLink>;
}

export type PlaybackHandle = {
  source: AudioSource;
};

export type VoiceSession = {
  guildId: string;
  channel: VoiceChannelRef;
  link: VoiceLink;
  player: PlaybackHandle | null;
};

export type VoiceChecks = {
  canDisconnect(context: VoiceCommandContext, current: VoiceChannelRef): void | Promise<void>;
  hasRequiredPermissions(context: VoiceCommandContext, target: VoiceChannelRef): void | Promise<void>;
  invokerIsConnected(context: VoiceCommandContext): boolean;
  messageIsValid(context: VoiceCommandContext, message: string): void | Promise<void>;
};

export type ReplyKind = "success" | "info" | "error";

export type VoiceCommandReply = {
  kind: ReplyKind;
  text: string;
};
