import type {
  ChannelRef,
  MemberJoinEvent,
  MemberUpdateEvent,
  RelayDirectory,
  RelayTransition,
  VoiceStateUpdateEvent,
  WatchConfiguration
} from "./types.ts";

export type DetectorContext<TMember> = {
  config: WatchConfiguration;
  directory: RelayDirectory<TMember>;
  onCheckFailed(guildId: string, channelId: string, error: unknown): void;
};

export type TransitionDetector<TEvent, TMember> = {
  isEnabled(config: WatchConfiguration): boolean;
  detect(event: TEvent, context: DetectorContext<TMember>): RelayTransition[];
};

export type TransitionDetectors<TMember> = {
  memberJoin: TransitionDetector<MemberJoinEvent, TMember>;
  channelAccess: TransitionDetector<MemberUpdateEvent<TMember>, TMember>;
  voicePresence: TransitionDetector<VoiceStateUpdateEvent, TMember>;
};

export function isAccessGained(beforeCanView: boolean, afterCanView: boolean) {
  return !beforeCanView && afterCanView;
}

function isWatchedVoiceChannel(channel: ChannelRef | null, watchIds: ReadonlySet<string>) {
  return Boolean(channel && watchIds.has(channel.id));
}

export function classifyVoiceTransition(
  event: VoiceStateUpdateEvent,
  watchVoiceChannelIds: ReadonlySet<string>
): RelayTransition | null {
  const { before, after, guild, subject } = event;
  // mute, deafen and stream toggles arrive with the channel unchanged
  if ((before?.id ?? null) === (after?.id ?? null)) return null;

  const beforeWatched = isWatchedVoiceChannel(before, watchVoiceChannelIds);
  const afterWatched = isWatchedVoiceChannel(after, watchVoiceChannelIds);

  if (after && afterWatched && !beforeWatched) {
    return { kind: "voice_joined", guild, subject, channel: after };
  }
  if (before && beforeWatched && !afterWatched) {
    return { kind: "voice_left", guild, subject, channel: before };
  }
  if (before && after && beforeWatched && afterWatched) {
    return { kind: "voice_moved", guild, subject, from: before, to: after };
  }
  return null;
}

export function detectChannelAccessGains<TMember>(
  event: MemberUpdateEvent<TMember>,
  { config, directory, onCheckFailed }: DetectorContext<TMember>
) {
  const transitions: RelayTransition[] = [];
  const guildId = event.guild.id;

  for (const channelId of config.watchTextChannelIds) {
    const channel = directory.getWatchableChannel(guildId, channelId);
    if (!channel) continue;

    let beforeCanView: boolean;
    let afterCanView: boolean;
    try {
      beforeCanView = directory.canViewChannel(guildId, channelId, event.before);
      afterCanView = directory.canViewChannel(guildId, channelId, event.after);
    } catch (error) {
      onCheckFailed(guildId, channelId, error);
      continue;
    }

    if (isAccessGained(beforeCanView, afterCanView)) {
      transitions.push({
        kind: "channel_access_gained",
        guild: event.guild,
        subject: event.subject,
        channel
      });
    }
  }

  return transitions;
}

export function createTransitionDetectors<TMember>(): TransitionDetectors<TMember> {
  return {
    memberJoin: {
      isEnabled: () => true,
      detect: (event) => [{ kind: "member_joined", guild: event.guild, subject: event.subject }]
    },
    channelAccess: {
      isEnabled: (config) => config.watchTextChannelIds.size > 0,
      detect: (event, context) => detectChannelAccessGains(event, context)
    },
    voicePresence: {
      isEnabled: (config) => config.watchVoiceChannelIds.size > 0,
      detect: (event, { config }) => {
        const transition = classifyVoiceTransition(event, config.watchVoiceChannelIds);
        return transition ? [transition] : [];
      }
    }
  };
}
