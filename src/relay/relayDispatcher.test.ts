import test from "node:test";
import assert from "node:assert/strict";
import { RelayDispatcher } from "./relayDispatcher.ts";
import { createActionRecorder, createFakeDirectory, createRecordingChannel } from "../testHelpers.ts";

const RELAY_ID = "800";

function createDispatcher(directoryOptions: Parameters<typeof createFakeDirectory>[0]) {
  const directory = createFakeDirectory(directoryOptions);
  const actionLog = createActionRecorder();
  const dispatcher = new RelayDispatcher({ relayChannelId: RELAY_ID, directory, actionLog });
  return { dispatcher, directory, actionLog };
}

test("relay fetches an uncached output channel once and reuses it", async () => {
  const output = createRecordingChannel(RELAY_ID);
  const { dispatcher, directory, actionLog } = createDispatcher({ fetchedOutputChannel: output.channel });

  await dispatcher.relay("first");
  await dispatcher.relay("second");

  assert.deepEqual(output.sent, ["first", "second"]);
  assert.equal(directory.outputFetches, 1);
  assert.deepEqual(actionLog.kinds(), ["relay_sent", "relay_sent"]);
});

test("relay prefers the client cache over a remote fetch", async () => {
  const output = createRecordingChannel(RELAY_ID);
  const { dispatcher, directory } = createDispatcher({ cachedOutputChannel: output.channel });

  await dispatcher.relay("hello");

  assert.deepEqual(output.sent, ["hello"]);
  assert.equal(directory.outputFetches, 0);
});

test("relay drops the message when the output channel cannot be fetched", async () => {
  const { dispatcher, directory, actionLog } = createDispatcher({
    outputFetchError: new Error("Unknown Channel")
  });

  await dispatcher.relay("lost");
  await dispatcher.relay("lost again");

  assert.equal(directory.outputFetches, 2);
  assert.deepEqual(actionLog.kinds(), ["relay_channel_not_found", "relay_channel_not_found"]);
  assert.equal(actionLog.actions[0].content, "relay_channel_fetch_failed: Unknown Channel");
  assert.equal(dispatcher.outputChannel, null);
});

test("relay drops the message when the platform reports no such channel", async () => {
  const { dispatcher, actionLog } = createDispatcher({ fetchedOutputChannel: null });

  await dispatcher.relay("lost");

  assert.deepEqual(actionLog.kinds(), ["relay_channel_not_found"]);
  assert.equal(actionLog.actions[0].channelId, RELAY_ID);
});

test("relay refuses output channels that cannot be posted to", async () => {
  const { dispatcher, actionLog } = createDispatcher({
    cachedOutputChannel: { id: RELAY_ID, postable: false, kind: "GuildCategory" }
  });

  await dispatcher.relay("nowhere");

  assert.deepEqual(actionLog.kinds(), ["relay_channel_wrong_type"]);
  assert.deepEqual(actionLog.actions[0].metadata, { channelKind: "GuildCategory" });
});

test("relay downgrades permission-denied sends to a warning", async () => {
  const output = createRecordingChannel(RELAY_ID, {
    sendError: { status: 403, code: 50013, message: "Missing Permissions" }
  });
  const { dispatcher, actionLog } = createDispatcher({ cachedOutputChannel: output.channel });

  await dispatcher.relay("denied");

  assert.deepEqual(output.sent, []);
  assert.deepEqual(actionLog.kinds(), ["relay_send_forbidden"]);
});

test("relay contains other send failures", async () => {
  const output = createRecordingChannel(RELAY_ID, { sendError: new Error("socket hang up") });
  const { dispatcher, actionLog } = createDispatcher({ cachedOutputChannel: output.channel });

  await dispatcher.relay("flaky");

  assert.deepEqual(actionLog.kinds(), ["relay_send_error"]);
  assert.equal(actionLog.actions[0].content, "relay_send_failed: socket hang up");
});
