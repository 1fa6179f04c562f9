import {
  AudioPlayer,
  AudioPlayerStatus,
  NoSubscriberBehavior,
  StreamType,
  VoiceConnection,
  VoiceConnectionStatus,
  createAudioPlayer,
  createAudioResource,
  entersState,
  joinVoiceChannel,
} from "@discordjs/voice";
import type { Client } from "discord.js";
import { Readable } from "stream";
import { VOICE_READY_TIMEOUT_MS } from "../constants";
import type { AudioSource, VoiceBackend, VoiceChannelRef, VoiceLink } from "../types";
import { type ClipPlayer, PlaybackLoop } from "./playbackLoop";

const RECONNECT_GRACE_MS = 5_000;

// @discordjs/voiceのAudioPlayerで1クリップずつ再生する。
function createClipPlayer(player: AudioPlayer): ClipPlayer {
  return {
    playClip(audio) {
      const resource = createAudioResource(Readable.from(audio), {
        inputType: StreamType.Arbitrary,
      });

      return new Promise((resolve, reject) => {
        const onIdle = () => {
          cleanup();
          resolve();
        };
        const onError = (error: Error) => {
          cleanup();
          reject(error);
        };
        const cleanup = () => {
          player.removeListener(AudioPlayerStatus.Idle, onIdle);
          player.removeListener("error", onError);
        };

        player.once(AudioPlayerStatus.Idle, onIdle);
        player.once("error", onError);
        player.play(resource);
      });
    },
    stop() {
      player.stop(true);
    },
  };
}

// 1ギルド分のボイス接続と再生ループ。
class DiscordVoiceLink implements VoiceLink {
  private readonly connection: VoiceConnection;
  private readonly playback: PlaybackLoop;
  private currentChannelId: string;

  constructor(guildId: string, connection: VoiceConnection, channelId: string) {
    this.connection = connection;
    this.currentChannelId = channelId;
    const player = createAudioPlayer({
      behaviors: { noSubscriber: NoSubscriberBehavior.Pause },
    });
    player.on("error", (error) => {
      console.error(`[VOICE] player error guild=${guildId}:`, error);
    });
    connection.subscribe(player);
    this.playback = new PlaybackLoop(createClipPlayer(player), guildId);
  }

  get channelId(): string {
    return this.currentChannelId;
  }

  async moveTo(channel: VoiceChannelRef): Promise<void> {
    const previousChannelId = this.currentChannelId;
    const rejoined = this.connection.rejoin({
      channelId: channel.id,
      selfDeaf: true,
      selfMute: false,
    });
    if (!rejoined) {
      throw new Error("ボイス接続が切断済みのため移動できません。");
    }

    try {
      await entersState(this.connection, VoiceConnectionStatus.Ready, VOICE_READY_TIMEOUT_MS);
    } catch (error) {
      // 失敗時は元のチャンネルへ戻す。
      this.connection.rejoin({ channelId: previousChannelId, selfDeaf: true, selfMute: false });
      throw new Error(`\`${channel.name}\` へのボイス接続が確立できませんでした。`, {
        cause: error,
      });
    }
    this.currentChannelId = channel.id;
  }

  adoptChannel(channelId: string): void {
    this.currentChannelId = channelId;
  }

  async disconnect(): Promise<void> {
    this.playback.stop();
    if (this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
      this.connection.destroy();
    }
  }

  isPlaying(): boolean {
    return this.playback.isPlaying();
  }

  play(source: AudioSource): void {
    this.playback.play(source);
  }
}

// 一時的な切断は短時間だけ再接続を待ち、戻らなければ破棄する。
function setupDisconnectHandlers(connection: VoiceConnection, guildId: string): void {
  connection.on("stateChange", (oldState, newState) => {
    if (oldState.status === newState.status) {
      return;
    }
    console.log(`[VOICE] connection ${oldState.status} -> ${newState.status} guild=${guildId}`);
    if (newState.status !== VoiceConnectionStatus.Disconnected) {
      return;
    }
    Promise.race([
      entersState(connection, VoiceConnectionStatus.Signalling, RECONNECT_GRACE_MS),
      entersState(connection, VoiceConnectionStatus.Connecting, RECONNECT_GRACE_MS),
    ]).catch(() => {
      if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
        console.log(`[VOICE] reconnect failed, destroying guild=${guildId}`);
        connection.destroy();
      }
    });
  });
  connection.on("error", (error) => {
    console.error(`[VOICE] connection error guild=${guildId}:`, error);
  });
}

export function createDiscordVoiceBackend(client: Client): VoiceBackend {
  return {
    async connect(guildId, channel) {
      const guild = client.guilds.cache.get(guildId);
      if (!guild) {
        throw new Error(`ギルドが見つかりません guild=${guildId}`);
      }

      const connection = joinVoiceChannel({
        channelId: channel.id,
        guildId,
        adapterCreator: guild.voiceAdapterCreator,
        selfDeaf: true,
        selfMute: false,
      });
      try {
        await entersState(connection, VoiceConnectionStatus.Ready, VOICE_READY_TIMEOUT_MS);
      } catch (error) {
        connection.destroy();
        throw new Error(
          `${VOICE_READY_TIMEOUT_MS / 1000}秒以内にボイス接続が確立できませんでした。`,
          { cause: error }
        );
      }

      setupDisconnectHandlers(connection, guildId);
      return new DiscordVoiceLink(guildId, connection, channel.id);
    },
  };
}
