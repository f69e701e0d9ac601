export type WatchConfiguration = Readonly<{
  operatorUserId: string;
  relayChannelId: string;
  watchGuildIds: ReadonlySet<string>;
  watchTextChannelIds: ReadonlySet<string>;
  watchVoiceChannelIds: ReadonlySet<string>;
}>;

export type MembershipResult = "found" | "not_found" | "denied" | "transport_error";

export type GuildRef = {
  id: string;
  name: string;
};

export type ChannelRef = {
  id: string;
  name: string;
};

export type SubjectRef = {
  id: string;
  name: string;
};

export type MemberJoinEvent = {
  guild: GuildRef;
  subject: SubjectRef;
};

// TMember is whatever the directory needs to evaluate permissions for one
// side of the update; the engine never looks inside it.
export type MemberUpdateEvent<TMember> = {
  guild: GuildRef;
  subject: SubjectRef;
  before: TMember;
  after: TMember;
};

export type VoiceStateUpdateEvent = {
  guild: GuildRef;
  subject: SubjectRef;
  before: ChannelRef | null;
  after: ChannelRef | null;
};

export type RelayTransition =
  | { kind: "member_joined"; guild: GuildRef; subject: SubjectRef }
  | { kind: "channel_access_gained"; guild: GuildRef; subject: SubjectRef; channel: ChannelRef }
  | { kind: "voice_joined"; guild: GuildRef; subject: SubjectRef; channel: ChannelRef }
  | { kind: "voice_left"; guild: GuildRef; subject: SubjectRef; channel: ChannelRef }
  | {
      kind: "voice_moved";
      guild: GuildRef;
      subject: SubjectRef;
      from: ChannelRef;
      to: ChannelRef;
    };

export type OutputChannel =
  | { id: string; postable: true; send(text: string): Promise<void> }
  | { id: string; postable: false; kind: string };

/**
 * Read side of the remote platform as the engine sees it. Implementations
 * wrap the gateway client's caches and REST calls.
 */
export interface RelayDirectory<TMember> {
  isMemberCached(guildId: string, userId: string): boolean;
  fetchMember(guildId: string, userId: string): Promise<MembershipResult>;
  /** Null when the channel is missing or not a kind whose visibility is watched. */
  getWatchableChannel(guildId: string, channelId: string): ChannelRef | null;
  /** May throw when the permission data cannot be evaluated. */
  canViewChannel(guildId: string, channelId: string, member: TMember): boolean;
  getCachedOutputChannel(channelId: string): OutputChannel | null;
  /** Resolves null when the platform reports no such channel. */
  fetchOutputChannel(channelId: string): Promise<OutputChannel | null>;
}
