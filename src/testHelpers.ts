import type { AddressInfo } from "node:net";
import { createHealthServer } from "./healthServer.ts";
import type { ActionLogSink, RuntimeAction } from "./runtimeActionLogger.ts";
import type { ChannelRef, MembershipResult, OutputChannel, RelayDirectory } from "./relay/types.ts";

export function isListenPermissionError(error: unknown): boolean {
  const isObject = typeof error === "object" && error !== null;
  const code = String(isObject && "code" in error ? error.code || "" : "").toUpperCase();
  const message = String(isObject && "message" in error ? error.message || "" : "");

  return (
    code === "EPERM" ||
    code === "EACCES" ||
    (code === "EADDRINUSE" && /port\s+0\s+in\s+use/i.test(message)) ||
    /listen\s+EPERM|listen\s+EACCES/i.test(message)
  );
}

export function createActionRecorder(): ActionLogSink & { actions: RuntimeAction[]; kinds(): string[] } {
  const actions: RuntimeAction[] = [];
  return {
    actions,
    logAction(action) {
      actions.push(action);
    },
    kinds() {
      return actions.map((action) => action.kind);
    }
  };
}

export type FakeMember = {
  id: string;
  viewableChannelIds: string[];
};

export function fakeMember(id: string, viewableChannelIds: string[] = []): FakeMember {
  return { id, viewableChannelIds };
}

export function createRecordingChannel(id: string, { sendError = null }: { sendError?: unknown } = {}) {
  const sent: string[] = [];
  const channel: OutputChannel = {
    id,
    postable: true,
    async send(text) {
      if (sendError) throw sendError;
      sent.push(text);
    }
  };
  return { channel, sent };
}

type FakeDirectoryOptions = {
  cachedMembers?: string[];
  fetchResults?: Record<string, MembershipResult>;
  channels?: ChannelRef[];
  brokenChannelIds?: string[];
  cachedOutputChannel?: OutputChannel | null;
  fetchedOutputChannel?: OutputChannel | null;
  outputFetchError?: unknown;
};

export type FakeDirectory = RelayDirectory<FakeMember> & {
  memberFetches: string[];
  outputFetches: number;
};

/**
 * In-process stand-in for the gateway caches. Cached members are keyed
 * "guildId:userId"; uncached lookups answer from fetchResults by guild id
 * and default to not_found.
 */
export function createFakeDirectory({
  cachedMembers = [],
  fetchResults = {},
  channels = [],
  brokenChannelIds = [],
  cachedOutputChannel = null,
  fetchedOutputChannel = null,
  outputFetchError = null
}: FakeDirectoryOptions = {}): FakeDirectory {
  const cached = new Set(cachedMembers);
  const channelsById = new Map(channels.map((channel) => [channel.id, channel]));
  const broken = new Set(brokenChannelIds);

  const directory: FakeDirectory = {
    memberFetches: [],
    outputFetches: 0,
    isMemberCached(guildId, userId) {
      return cached.has(`${guildId}:${userId}`);
    },
    async fetchMember(guildId, userId) {
      directory.memberFetches.push(`${guildId}:${userId}`);
      return fetchResults[guildId] ?? "not_found";
    },
    getWatchableChannel(_guildId, channelId) {
      return channelsById.get(channelId) ?? null;
    },
    canViewChannel(_guildId, channelId, member) {
      if (broken.has(channelId)) {
        throw new Error(`malformed overwrites on ${channelId}`);
      }
      return member.viewableChannelIds.includes(channelId);
    },
    getCachedOutputChannel() {
      return cachedOutputChannel;
    },
    async fetchOutputChannel() {
      directory.outputFetches += 1;
      if (outputFetchError) throw outputFetchError;
      return fetchedOutputChannel;
    }
  };
  return directory;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, Math.floor(ms))));
}

export function readListeningPort(server: { address(): AddressInfo | string | null }) {
  const address = server.address();
  const port = typeof address === "object" && address ? address.port : 0;
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error("health test server did not provide a valid port");
  }
  return port;
}

export async function withHealthServer(
  run: (context: {
    baseUrl: string;
    port: number;
    actionLog: ReturnType<typeof createActionRecorder>;
  }) => Promise<void>
): Promise<{ skipped: boolean; reason?: string }> {
  const actionLog = createActionRecorder();
  const health = createHealthServer({
    appConfig: { healthHost: "127.0.0.1", healthPort: 0 },
    actionLog
  });

  try {
    await health.listening;
    const port = readListeningPort(health.server);
    await run({ baseUrl: `http://127.0.0.1:${port}`, port, actionLog });
  } catch (error) {
    if (isListenPermissionError(error)) {
      return { skipped: true, reason: "listen_permission_denied" };
    }
    throw error;
  } finally {
    await new Promise<void>((resolve) => {
      health.server.close(() => resolve());
      health.server.closeAllConnections();
    });
  }

  return { skipped: false };
}
