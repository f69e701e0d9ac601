import dotenv from "dotenv";
import {
  parseBooleanFlag,
  parseNumberOrFallback,
  parseSnowflake,
  parseSnowflakeList
} from "./normalization/valueParsers.ts";

dotenv.config();

type EnvSource = Record<string, string | undefined>;

export type AppConfig = {
  discordToken: string;
  relayChannelId: string;
  operatorUserId: string;
  watchGuildIds: string[];
  watchTextChannelIds: string[];
  watchVoiceChannelIds: string[];
  serializePerGuild: boolean;
  healthPort: number;
  healthHost: string;
  runtimeStructuredLogsEnabled: boolean;
  runtimeStructuredLogsStdout: boolean;
  runtimeStructuredLogsFilePath: string;
};

export function loadAppConfig(env: EnvSource = process.env): AppConfig {
  return {
    discordToken: String(env.DISCORD_TOKEN ?? "").trim(),
    relayChannelId: parseSnowflake(env.RELAY_CHANNEL_ID),
    operatorUserId: parseSnowflake(env.MY_USER_ID),
    watchGuildIds: parseSnowflakeList(env.WATCH_GUILD_IDS),
    watchTextChannelIds: parseSnowflakeList(env.WATCH_TEXT_CHANNEL_IDS),
    watchVoiceChannelIds: parseSnowflakeList(env.WATCH_VOICE_CHANNEL_IDS),
    serializePerGuild: parseBooleanFlag(env.RELAY_SERIALIZE_PER_GUILD, false),
    healthPort: normalizePort(env.PORT, 8080),
    healthHost: normalizeHealthHost(env.HEALTH_HOST),
    runtimeStructuredLogsEnabled: parseBooleanFlag(env.RUNTIME_STRUCTURED_LOGS_ENABLED, true),
    runtimeStructuredLogsStdout: parseBooleanFlag(env.RUNTIME_STRUCTURED_LOGS_STDOUT, true),
    runtimeStructuredLogsFilePath:
      env.RUNTIME_STRUCTURED_LOGS_FILE_PATH ?? "data/logs/relay-actions.ndjson"
  };
}

export const appConfig = loadAppConfig();

export function ensureRuntimeEnv(config: AppConfig = appConfig) {
  const missing: string[] = [];
  if (!config.discordToken) missing.push("DISCORD_TOKEN");
  if (!config.relayChannelId) missing.push("RELAY_CHANNEL_ID");
  if (!config.operatorUserId) missing.push("MY_USER_ID");
  if (missing.length > 0) {
    throw new Error(`Missing ${missing.join(", ")} in environment.`);
  }
}

export function normalizeHealthHost(value: unknown) {
  const normalized = String(value || "").trim();
  return normalized || "0.0.0.0";
}

function normalizePort(value: unknown, fallback: number) {
  const port = Math.floor(parseNumberOrFallback(value, fallback));
  if (port < 0 || port > 65_535) return fallback;
  return port;
}
