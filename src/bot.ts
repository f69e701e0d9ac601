import { Client, Events, GatewayIntentBits } from "discord.js";
import type { AppConfig } from "./config.ts";
import type { ActionLogSink } from "./runtimeActionLogger.ts";
import {
  DiscordRelayDirectory,
  toMemberJoinEvent,
  toMemberUpdateEvent,
  toVoiceStateUpdateEvent,
  type DiscordMemberSnapshot
} from "./relay/discordDirectory.ts";
import { RelayEngine, createWatchConfiguration } from "./relay/relayEngine.ts";
import { describeError } from "./utils.ts";

type RelayBotOptions = {
  appConfig: AppConfig;
  actionLog: ActionLogSink;
};

export class RelayBot {
  appConfig: AppConfig;
  actionLog: ActionLogSink;
  client: Client;
  directory: DiscordRelayDirectory;
  engine: RelayEngine<DiscordMemberSnapshot>;

  constructor({ appConfig, actionLog }: RelayBotOptions) {
    this.appConfig = appConfig;
    this.actionLog = actionLog;

    // no message content: the relay only reads membership and voice state
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers, GatewayIntentBits.GuildVoiceStates]
    });
    this.directory = new DiscordRelayDirectory({ client: this.client });
    this.engine = new RelayEngine({
      config: createWatchConfiguration(appConfig),
      directory: this.directory,
      actionLog,
      serializePerGuild: appConfig.serializePerGuild
    });

    this.registerEvents();
  }

  registerEvents() {
    this.client.on(Events.ClientReady, () => {
      this.reportReady().catch((error: unknown) => {
        this.actionLog.logAction({
          kind: "bot_error",
          userId: this.client.user?.id,
          content: `ready_report: ${describeError(error)}`
        });
      });
    });

    this.client.on("shardDisconnect", (event, shardId) => {
      this.actionLog.logAction({
        kind: "bot_error",
        userId: this.client.user?.id,
        content: `gateway_shard_disconnect: shard=${shardId} code=${event.code}`
      });
    });

    this.client.on("shardError", (error, shardId) => {
      this.actionLog.logAction({
        kind: "bot_error",
        userId: this.client.user?.id,
        content: `gateway_shard_error: shard=${shardId} ${describeError(error)}`
      });
    });

    this.client.on("error", (error) => {
      this.actionLog.logAction({
        kind: "bot_error",
        userId: this.client.user?.id,
        content: `gateway_error: ${describeError(error)}`
      });
    });

    this.client.on("invalidated", () => {
      this.actionLog.logAction({
        kind: "bot_error",
        userId: this.client.user?.id,
        content: "gateway_session_invalidated"
      });
    });

    this.client.on("guildMemberAdd", async (member) => {
      try {
        await this.engine.handleMemberJoin(toMemberJoinEvent(member));
      } catch (error) {
        this.logEventError("member_join", member.guild.id, member.id, error);
      }
    });

    this.client.on("guildMemberUpdate", async (before, after) => {
      try {
        await this.engine.handleMemberUpdate(toMemberUpdateEvent(before, after));
      } catch (error) {
        this.logEventError("member_update", after.guild.id, after.id, error);
      }
    });

    this.client.on("voiceStateUpdate", async (before, after) => {
      try {
        await this.engine.handleVoiceStateUpdate(toVoiceStateUpdateEvent(before, after));
      } catch (error) {
        this.logEventError("voice_state_update", after.guild.id, after.id, error);
      }
    });
  }

  async reportReady() {
    const guilds = [...this.client.guilds.cache.values()];
    const guildList = guilds.map((guild) => `${guild.name}(${guild.id})`).join(", ");
    console.log(`Ready as ${this.client.user?.tag || "unknown"} | Watching ${guilds.length} guilds: ${guildList}`);
    this.actionLog.logAction({
      kind: "bot_ready",
      userId: this.client.user?.id,
      content: "bot_ready",
      metadata: {
        guildCount: guilds.length,
        watch: this.engine.describeWatch()
      }
    });

    const relayChannelId = this.appConfig.relayChannelId;
    const channel =
      this.client.channels.cache.get(relayChannelId) ??
      (await this.client.channels.fetch(relayChannelId).catch((error: unknown) => {
        this.actionLog.logAction({
          kind: "bot_relay_channel_error",
          channelId: relayChannelId,
          content: `relay_channel_lookup_failed: ${describeError(error)}`
        });
        return null;
      }));

    if (channel && "name" in channel && channel.name) {
      console.log(`Relay channel: ${channel.name} (${relayChannelId})`);
      this.actionLog.logAction({
        kind: "bot_relay_channel_resolved",
        channelId: relayChannelId,
        content: `relay_channel: ${channel.name}`
      });
    } else {
      console.log(`Relay channel NOT FOUND (${relayChannelId})`);
    }
  }

  async start() {
    await this.client.login(this.appConfig.discordToken);
  }

  async stop() {
    await this.client.destroy();
  }

  logEventError(source: string, guildId: string, userId: string, error: unknown) {
    this.actionLog.logAction({
      kind: "bot_error",
      guildId,
      userId,
      content: `${source}: ${describeError(error)}`
    });
  }
}
