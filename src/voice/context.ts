import {
  type ChatInputCommandInteraction,
  GuildMember,
  PermissionsBitField,
  type VoiceBasedChannel,
  type VoiceState,
} from "discord.js";
import { REQUIRED_VOICE_PERMISSIONS } from "../constants";
import type { VoiceChannelRef, VoiceCommandContext } from "../types";

function toChannelRef(channel: VoiceBasedChannel, me: GuildMember): VoiceChannelRef {
  return {
    id: channel.id,
    name: channel.name,
    missingBotPermissions: channel.permissionsFor(me).missing([...REQUIRED_VOICE_PERMISSIONS]),
    humanMemberIds: channel.members.filter((member) => !member.user.bot).map((member) => member.id),
  };
}

// ボイス状態更新から、ボットが今いるチャンネルを取り出す。通話外ならnull。
export function buildBotChannelRef(state: VoiceState): VoiceChannelRef | null {
  const me = state.member ?? state.guild.members.me;
  if (!state.channel || !me) {
    return null;
  }
  return toChannelRef(state.channel, me);
}

// コマンド実行時点のDiscordの状態を、コア処理が扱う形に写し取る。
export async function buildVoiceCommandContext(
  interaction: ChatInputCommandInteraction
): Promise<VoiceCommandContext | null> {
  const { guild, member } = interaction;
  if (!guild || !(member instanceof GuildMember)) {
    return null;
  }

  const me = guild.members.me ?? (await guild.members.fetchMe());
  const invokerVoiceChannel = member.voice.channel;
  const botVoiceChannel = me.voice.channel;

  return {
    guildId: guild.id,
    textChannelId: interaction.channelId,
    invokerId: member.id,
    invokerChannel: invokerVoiceChannel ? toChannelRef(invokerVoiceChannel, me) : null,
    invokerCanMoveMembers: member.permissions.has(PermissionsBitField.Flags.MoveMembers),
    botChannel: botVoiceChannel ? toChannelRef(botVoiceChannel, me) : null,
  };
}
