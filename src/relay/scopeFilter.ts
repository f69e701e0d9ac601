import type { ActionLogSink } from "../runtimeActionLogger.ts";
import type { MembershipResult, RelayDirectory, WatchConfiguration } from "./types.ts";

type ScopeDirectory = Pick<RelayDirectory<unknown>, "isMemberCached" | "fetchMember">;

type ScopeFilterOptions = {
  config: WatchConfiguration;
  directory: ScopeDirectory;
  actionLog: ActionLogSink;
};

export function isGuildAllowed(config: WatchConfiguration, guildId: string) {
  return config.watchGuildIds.size === 0 || config.watchGuildIds.has(guildId);
}

// Anything short of a confirmed membership suppresses the relay.
export function membershipAllowsRelay(result: MembershipResult) {
  return result === "found";
}

export class ScopeFilter {
  config: WatchConfiguration;
  directory: ScopeDirectory;
  actionLog: ActionLogSink;

  constructor({ config, directory, actionLog }: ScopeFilterOptions) {
    this.config = config;
    this.directory = directory;
    this.actionLog = actionLog;
  }

  async isWatched(guildId: string) {
    if (!isGuildAllowed(this.config, guildId)) return false;

    const operatorUserId = this.config.operatorUserId;
    if (this.directory.isMemberCached(guildId, operatorUserId)) return true;

    const result = await this.directory.fetchMember(guildId, operatorUserId);
    if (membershipAllowsRelay(result)) return true;

    this.actionLog.logAction({
      kind: result === "not_found" ? "scope_membership_missing" : "scope_membership_error",
      guildId,
      userId: operatorUserId,
      content: `operator_membership_${result}`,
      metadata: { result }
    });
    return false;
  }
}
