import { VoiceCommandError, toVoiceCommandError } from "../errors";
import type { SessionHandle } from "../state";
import type { AudioSource, VoiceCommandContext } from "../types";
import { type CoordinatorDeps, connectOrMove } from "./connectionCoordinator";
import { type VoiceProfileRegistry, buildSpeechRequest } from "./voiceProfiles";

export type DispatcherDeps = CoordinatorDeps & {
  profiles: VoiceProfileRegistry;
  createSource: () => AudioSource;
};

// 呼び出し側がギルドのロックを保持している前提。
export async function speak(
  deps: DispatcherDeps,
  context: VoiceCommandContext,
  message: string,
  handle: SessionHandle
): Promise<void> {
  const target = context.invokerChannel;
  if (!deps.checks.invokerIsConnected(context) || !target) {
    throw new VoiceCommandError(
      "INVALID_REQUEST",
      "ボイスチャンネルに参加してから再度試してください。",
      "speak"
    );
  }
  try {
    await deps.checks.messageIsValid(context, message);
  } catch (error) {
    throw toVoiceCommandError(error, "speak");
  }

  // 接続・移動の失敗はconnect/moveの操作として、そのまま呼び出し元へ返す。
  const current = handle.get();
  const session =
    current && current.channel.id === target.id
      ? current
      : (await connectOrMove(deps, context, target, handle)).session;

  const source = session.player?.source ?? deps.createSource();
  const profile = deps.profiles.resolve(context.invokerId, context.textChannelId);
  const request = buildSpeechRequest(message, profile);

  try {
    await source.submitRequest(request);
  } catch (error) {
    throw toVoiceCommandError(error, "speak");
  }

  // 投入に成功してから音源をセッションに紐づける。
  if (!session.player) {
    handle.commit({ ...session, player: { source } });
  }
  if (!session.link.isPlaying()) {
    session.link.play(source);
  }
}
