import test from "node:test";
import assert from "node:assert/strict";
import { classifyVoiceTransition, createTransitionDetectors, detectChannelAccessGains, isAccessGained } from "./transitions.ts";
import { createWatchConfiguration } from "./relayEngine.ts";
import { createFakeDirectory, fakeMember, type FakeMember } from "../testHelpers.ts";
import type { ChannelRef } from "./types.ts";

const GUILD = { id: "1", name: "G" };
const ALICE = { id: "500", name: "alice" };
const WATCHED_A = { id: "98", name: "a" };
const WATCHED_B = { id: "99", name: "b" };
const UNWATCHED = { id: "10", name: "afk" };
const VOICE_WATCH = new Set(["98", "99"]);

function voiceKind(before: ChannelRef | null, after: ChannelRef | null) {
  return classifyVoiceTransition({ guild: GUILD, subject: ALICE, before, after }, VOICE_WATCH)?.kind ?? null;
}

test("isAccessGained only fires on the false to true edge", () => {
  assert.equal(isAccessGained(false, true), true);
  assert.equal(isAccessGained(false, false), false);
  assert.equal(isAccessGained(true, true), false);
  assert.equal(isAccessGained(true, false), false);
});

test("classifyVoiceTransition follows watch-set membership of both endpoints", () => {
  assert.equal(voiceKind(null, WATCHED_A), "voice_joined");
  assert.equal(voiceKind(UNWATCHED, WATCHED_A), "voice_joined");
  assert.equal(voiceKind(WATCHED_A, null), "voice_left");
  assert.equal(voiceKind(WATCHED_A, UNWATCHED), "voice_left");
  assert.equal(voiceKind(WATCHED_A, WATCHED_B), "voice_moved");
  assert.equal(voiceKind(UNWATCHED, null), null);
  assert.equal(voiceKind(null, UNWATCHED), null);
  assert.equal(voiceKind(UNWATCHED, { id: "11", name: "lobby" }), null);
});

test("classifyVoiceTransition ignores updates that keep the same channel", () => {
  assert.equal(voiceKind(WATCHED_A, WATCHED_A), null);
  assert.equal(voiceKind(UNWATCHED, UNWATCHED), null);
  assert.equal(voiceKind(null, null), null);
});

test("classifyVoiceTransition reports both endpoints of a move", () => {
  const transition = classifyVoiceTransition(
    { guild: GUILD, subject: ALICE, before: WATCHED_A, after: WATCHED_B },
    VOICE_WATCH
  );
  assert.deepEqual(transition, {
    kind: "voice_moved",
    guild: GUILD,
    subject: ALICE,
    from: WATCHED_A,
    to: WATCHED_B
  });
});

test("detectChannelAccessGains skips missing channels and reports check failures", () => {
  const failures: string[] = [];
  const config = createWatchConfiguration({
    operatorUserId: "700",
    relayChannelId: "800",
    watchGuildIds: [],
    watchTextChannelIds: ["42", "43", "44"],
    watchVoiceChannelIds: []
  });
  const directory = createFakeDirectory({
    channels: [
      { id: "42", name: "general" },
      { id: "43", name: "staff" }
    ],
    brokenChannelIds: ["42"]
  });

  const transitions = detectChannelAccessGains(
    {
      guild: GUILD,
      subject: ALICE,
      before: fakeMember(ALICE.id),
      after: fakeMember(ALICE.id, ["42", "43", "44"])
    },
    {
      config,
      directory,
      onCheckFailed: (_guildId, channelId) => failures.push(channelId)
    }
  );

  assert.deepEqual(transitions, [
    { kind: "channel_access_gained", guild: GUILD, subject: ALICE, channel: { id: "43", name: "staff" } }
  ]);
  assert.deepEqual(failures, ["42"]);
});

test("detector family enables each detector from its own watch set", () => {
  const detectors = createTransitionDetectors<FakeMember>();
  const disabled = createWatchConfiguration({
    operatorUserId: "700",
    relayChannelId: "800",
    watchGuildIds: [],
    watchTextChannelIds: [],
    watchVoiceChannelIds: []
  });
  const enabled = createWatchConfiguration({
    operatorUserId: "700",
    relayChannelId: "800",
    watchGuildIds: [],
    watchTextChannelIds: ["42"],
    watchVoiceChannelIds: ["99"]
  });

  assert.deepEqual(
    [detectors.memberJoin, detectors.channelAccess, detectors.voicePresence].map((detector) => [
      detector.isEnabled(disabled),
      detector.isEnabled(enabled)
    ]),
    [
      [true, true],
      [false, true],
      [false, true]
    ]
  );
});
