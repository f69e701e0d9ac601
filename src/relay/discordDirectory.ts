import {
  BaseGuildTextChannel,
  ChannelType,
  GuildChannel,
  PermissionFlagsBits,
  type Channel,
  type Client,
  type Guild,
  type GuildMember,
  type PartialGuildMember,
  type VoiceState
} from "discord.js";
import { classifyMemberLookupError } from "./discordErrors.ts";
import type {
  ChannelRef,
  GuildRef,
  MemberJoinEvent,
  MemberUpdateEvent,
  MembershipResult,
  OutputChannel,
  RelayDirectory,
  SubjectRef,
  VoiceStateUpdateEvent
} from "./types.ts";

export type DiscordMemberSnapshot = GuildMember | PartialGuildMember;

const WATCHABLE_CHANNEL_TYPES = new Set<ChannelType>([
  ChannelType.GuildText,
  ChannelType.GuildAnnouncement,
  ChannelType.GuildForum,
  ChannelType.GuildCategory
]);

export function toGuildRef(guild: Guild): GuildRef {
  return { id: guild.id, name: guild.name };
}

function toSubjectRef(member: GuildMember): SubjectRef {
  return { id: member.id, name: member.user.username };
}

function toVoiceLocation(state: VoiceState): ChannelRef | null {
  const channel = state.channel;
  return channel ? { id: channel.id, name: channel.name } : null;
}

export function toMemberJoinEvent(member: GuildMember): MemberJoinEvent {
  return { guild: toGuildRef(member.guild), subject: toSubjectRef(member) };
}

export function toMemberUpdateEvent(
  before: DiscordMemberSnapshot,
  after: GuildMember
): MemberUpdateEvent<DiscordMemberSnapshot> {
  return {
    guild: toGuildRef(after.guild),
    subject: toSubjectRef(after),
    before,
    after
  };
}

export function toVoiceStateUpdateEvent(before: VoiceState, after: VoiceState): VoiceStateUpdateEvent {
  const member = after.member ?? before.member;
  const username = member?.user.username ?? after.client.users.cache.get(after.id)?.username ?? after.id;
  return {
    guild: toGuildRef(after.guild),
    subject: { id: after.id, name: username },
    before: toVoiceLocation(before),
    after: toVoiceLocation(after)
  };
}

function toOutputChannel(channel: Channel): OutputChannel {
  // text and announcement channels
  if (channel instanceof BaseGuildTextChannel) {
    const textChannel = channel;
    return {
      id: textChannel.id,
      postable: true,
      send: async (text) => {
        await textChannel.send(text);
      }
    };
  }
  return { id: channel.id, postable: false, kind: ChannelType[channel.type] ?? String(channel.type) };
}

export class DiscordRelayDirectory implements RelayDirectory<DiscordMemberSnapshot> {
  client: Client;

  constructor({ client }: { client: Client }) {
    this.client = client;
  }

  isMemberCached(guildId: string, userId: string) {
    return Boolean(this.client.guilds.cache.get(guildId)?.members.cache.has(userId));
  }

  async fetchMember(guildId: string, userId: string): Promise<MembershipResult> {
    const guild = this.client.guilds.cache.get(guildId);
    if (!guild) return "not_found";
    try {
      await guild.members.fetch(userId);
      return "found";
    } catch (error) {
      return classifyMemberLookupError(error);
    }
  }

  resolveWatchableChannel(guildId: string, channelId: string): GuildChannel | null {
    const channel = this.client.guilds.cache.get(guildId)?.channels.cache.get(channelId);
    if (!(channel instanceof GuildChannel) || !WATCHABLE_CHANNEL_TYPES.has(channel.type)) return null;
    return channel;
  }

  getWatchableChannel(guildId: string, channelId: string): ChannelRef | null {
    const channel = this.resolveWatchableChannel(guildId, channelId);
    return channel ? { id: channel.id, name: channel.name } : null;
  }

  canViewChannel(guildId: string, channelId: string, member: DiscordMemberSnapshot) {
    const channel = this.resolveWatchableChannel(guildId, channelId);
    if (!channel) {
      throw new Error(`channel ${channelId} is no longer watchable`);
    }
    if (member.partial) {
      throw new Error(`member ${member.id} snapshot is partial`);
    }
    return channel.permissionsFor(member).has(PermissionFlagsBits.ViewChannel);
  }

  getCachedOutputChannel(channelId: string) {
    const channel = this.client.channels.cache.get(channelId);
    return channel ? toOutputChannel(channel) : null;
  }

  async fetchOutputChannel(channelId: string) {
    const channel = await this.client.channels.fetch(channelId);
    return channel ? toOutputChannel(channel) : null;
  }
}
