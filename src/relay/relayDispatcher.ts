import type { ActionLogSink } from "../runtimeActionLogger.ts";
import { describeError } from "../utils.ts";
import { isPermissionDeniedError } from "./discordErrors.ts";
import type { OutputChannel, RelayDirectory } from "./types.ts";

type OutputDirectory = Pick<RelayDirectory<unknown>, "getCachedOutputChannel" | "fetchOutputChannel">;

type RelayDispatcherOptions = {
  relayChannelId: string;
  directory: OutputDirectory;
  actionLog: ActionLogSink;
};

export class RelayDispatcher {
  relayChannelId: string;
  directory: OutputDirectory;
  actionLog: ActionLogSink;
  outputChannel: OutputChannel | null;

  constructor({ relayChannelId, directory, actionLog }: RelayDispatcherOptions) {
    this.relayChannelId = relayChannelId;
    this.directory = directory;
    this.actionLog = actionLog;
    this.outputChannel = null;
  }

  async resolveOutputChannel() {
    if (this.outputChannel) return this.outputChannel;

    let channel = this.directory.getCachedOutputChannel(this.relayChannelId);
    if (!channel) {
      try {
        channel = await this.directory.fetchOutputChannel(this.relayChannelId);
      } catch (error) {
        this.actionLog.logAction({
          kind: "relay_channel_not_found",
          channelId: this.relayChannelId,
          content: `relay_channel_fetch_failed: ${describeError(error)}`
        });
        return null;
      }
    }

    if (!channel) {
      this.actionLog.logAction({
        kind: "relay_channel_not_found",
        channelId: this.relayChannelId,
        content: "relay_channel_not_found"
      });
      return null;
    }

    this.outputChannel = channel;
    return channel;
  }

  async relay(text: string) {
    const channel = await this.resolveOutputChannel();
    if (!channel) return;

    if (!channel.postable) {
      this.actionLog.logAction({
        kind: "relay_channel_wrong_type",
        channelId: channel.id,
        content: "relay_channel_wrong_type",
        metadata: { channelKind: channel.kind }
      });
      return;
    }

    try {
      await channel.send(text);
    } catch (error) {
      const forbidden = isPermissionDeniedError(error);
      this.actionLog.logAction({
        kind: forbidden ? "relay_send_forbidden" : "relay_send_error",
        channelId: channel.id,
        content: forbidden ? "relay_send_forbidden" : `relay_send_failed: ${describeError(error)}`
      });
      return;
    }

    this.actionLog.logAction({
      kind: "relay_sent",
      channelId: channel.id,
      content: text
    });
  }
}
