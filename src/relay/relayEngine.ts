import type { AppConfig } from "../config.ts";
import { formatUtcTimestamp } from "../normalization/time.ts";
import type { ActionLogSink } from "../runtimeActionLogger.ts";
import { describeError } from "../utils.ts";
import { formatRelayLine } from "./formatter.ts";
import { GuildQueue } from "./guildQueue.ts";
import { RelayDispatcher } from "./relayDispatcher.ts";
import { ScopeFilter } from "./scopeFilter.ts";
import {
  createTransitionDetectors,
  type DetectorContext,
  type TransitionDetector,
  type TransitionDetectors
} from "./transitions.ts";
import type {
  GuildRef,
  MemberJoinEvent,
  MemberUpdateEvent,
  RelayDirectory,
  VoiceStateUpdateEvent,
  WatchConfiguration
} from "./types.ts";

type WatchConfigSource = Pick<
  AppConfig,
  "operatorUserId" | "relayChannelId" | "watchGuildIds" | "watchTextChannelIds" | "watchVoiceChannelIds"
>;

type RelayEngineOptions<TMember> = {
  config: WatchConfiguration;
  directory: RelayDirectory<TMember>;
  actionLog: ActionLogSink;
  now?: () => Date;
  serializePerGuild?: boolean;
};

export function createWatchConfiguration(source: WatchConfigSource): WatchConfiguration {
  return Object.freeze({
    operatorUserId: source.operatorUserId,
    relayChannelId: source.relayChannelId,
    watchGuildIds: new Set(source.watchGuildIds),
    watchTextChannelIds: new Set(source.watchTextChannelIds),
    watchVoiceChannelIds: new Set(source.watchVoiceChannelIds)
  });
}

export class RelayEngine<TMember> {
  config: WatchConfiguration;
  directory: RelayDirectory<TMember>;
  actionLog: ActionLogSink;
  now: () => Date;
  scopeFilter: ScopeFilter;
  dispatcher: RelayDispatcher;
  detectors: TransitionDetectors<TMember>;
  detectorContext: DetectorContext<TMember>;
  guildQueue: GuildQueue | null;

  constructor({
    config,
    directory,
    actionLog,
    now = () => new Date(),
    serializePerGuild = false
  }: RelayEngineOptions<TMember>) {
    this.config = config;
    this.directory = directory;
    this.actionLog = actionLog;
    this.now = now;
    this.scopeFilter = new ScopeFilter({ config, directory, actionLog });
    this.dispatcher = new RelayDispatcher({
      relayChannelId: config.relayChannelId,
      directory,
      actionLog
    });
    this.detectors = createTransitionDetectors<TMember>();
    this.detectorContext = {
      config,
      directory,
      onCheckFailed: (guildId, channelId, error) => {
        this.actionLog.logAction({
          kind: "access_permission_check_failed",
          guildId,
          channelId,
          content: `access_permission_check_failed: ${describeError(error)}`
        });
      }
    };
    this.guildQueue = serializePerGuild
      ? new GuildQueue({
          onTaskError: (guildId, error) => this.logHandlerError(guildId, error)
        })
      : null;
  }

  handleMemberJoin(event: MemberJoinEvent) {
    return this.schedule(event.guild, () => this.evaluate(this.detectors.memberJoin, event.guild, event));
  }

  handleMemberUpdate(event: MemberUpdateEvent<TMember>) {
    return this.schedule(event.guild, () => this.evaluate(this.detectors.channelAccess, event.guild, event));
  }

  handleVoiceStateUpdate(event: VoiceStateUpdateEvent) {
    return this.schedule(event.guild, () => this.evaluate(this.detectors.voicePresence, event.guild, event));
  }

  describeWatch() {
    return {
      operatorUserId: this.config.operatorUserId,
      relayChannelId: this.config.relayChannelId,
      watchGuildIds: [...this.config.watchGuildIds],
      watchTextChannelIds: [...this.config.watchTextChannelIds],
      watchVoiceChannelIds: [...this.config.watchVoiceChannelIds],
      serializePerGuild: Boolean(this.guildQueue)
    };
  }

  async schedule(guild: GuildRef, task: () => Promise<void>) {
    if (this.guildQueue) {
      await this.guildQueue.run(guild.id, task);
      return;
    }
    try {
      await task();
    } catch (error) {
      this.logHandlerError(guild.id, error);
    }
  }

  async evaluate<TEvent>(detector: TransitionDetector<TEvent, TMember>, guild: GuildRef, event: TEvent) {
    if (!detector.isEnabled(this.config)) return;
    if (!(await this.scopeFilter.isWatched(guild.id))) return;

    const transitions = detector.detect(event, this.detectorContext);
    for (const transition of transitions) {
      const line = formatRelayLine(transition, formatUtcTimestamp(this.now()));
      await this.dispatcher.relay(line);
    }
  }

  logHandlerError(guildId: string, error: unknown) {
    this.actionLog.logAction({
      kind: "relay_handler_error",
      guildId,
      content: `relay_handler_failed: ${describeError(error)}`
    });
  }
}
