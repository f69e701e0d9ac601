import test from "node:test";
import assert from "node:assert/strict";
import { ChannelType, Client, PermissionFlagsBits, type Guild } from "discord.js";
import { DiscordRelayDirectory, toMemberJoinEvent, toVoiceStateUpdateEvent } from "./discordDirectory.ts";

const GUILD_ID = "1";
const VIEWER_ROLE_ID = "9";

function rawUser(id: string, username: string) {
  return { id, username, discriminator: "0", global_name: null, avatar: null };
}

function rawRole(id: string, name: string, permissions: bigint) {
  return {
    id,
    name,
    color: 0,
    hoist: false,
    position: 0,
    permissions: String(permissions),
    managed: false,
    mentionable: false
  };
}

function rawMember(id: string, username: string, roles: string[]) {
  return { user: rawUser(id, username), roles, joined_at: "2024-01-01T00:00:00.000Z", deaf: false, mute: false };
}

function rawChannel(id: string, type: ChannelType, name: string) {
  return { id, type, name, guild_id: GUILD_ID, position: 0, permission_overwrites: [] };
}

async function withDirectory(
  run: (context: {
    client: Client;
    directory: DiscordRelayDirectory;
    guild: Guild;
  }) => Promise<void> | void
) {
  const client = new Client({ intents: [] });
  try {
    const guild = client.guilds["_add"]({
      id: GUILD_ID,
      name: "G",
      owner_id: "999",
      roles: [
        rawRole(GUILD_ID, "@everyone", 0n),
        rawRole(VIEWER_ROLE_ID, "viewer", PermissionFlagsBits.ViewChannel)
      ],
      channels: [
        rawChannel("42", ChannelType.GuildText, "general"),
        rawChannel("43", ChannelType.GuildAnnouncement, "news"),
        rawChannel("44", ChannelType.GuildCategory, "lobby"),
        rawChannel("55", ChannelType.GuildVoice, "Lounge")
      ],
      members: [rawMember("500", "alice", [VIEWER_ROLE_ID])]
    });
    await run({ client, directory: new DiscordRelayDirectory({ client }), guild });
  } finally {
    await client.destroy();
  }
}

test("getWatchableChannel accepts text, announcement and category channels only", async () => {
  await withDirectory(({ directory }) => {
    assert.deepEqual(directory.getWatchableChannel(GUILD_ID, "42"), { id: "42", name: "general" });
    assert.deepEqual(directory.getWatchableChannel(GUILD_ID, "43"), { id: "43", name: "news" });
    assert.deepEqual(directory.getWatchableChannel(GUILD_ID, "44"), { id: "44", name: "lobby" });
    assert.equal(directory.getWatchableChannel(GUILD_ID, "55"), null);
    assert.equal(directory.getWatchableChannel(GUILD_ID, "77"), null);
    assert.equal(directory.getWatchableChannel("2", "42"), null);
  });
});

test("canViewChannel follows role grants on full member snapshots", async () => {
  await withDirectory(({ directory, guild }) => {
    const after = guild.members.cache.get("500");
    assert.ok(after);
    const before = guild.members["_add"](rawMember("500", "alice", []), false);

    assert.equal(directory.canViewChannel(GUILD_ID, "42", before), false);
    assert.equal(directory.canViewChannel(GUILD_ID, "42", after), true);
  });
});

test("canViewChannel throws for partial members and unwatchable channels", async () => {
  await withDirectory(({ directory, guild }) => {
    const partial = guild.members["_add"]({ user: rawUser("501", "bob"), roles: [] }, false);
    assert.equal(partial.joinedTimestamp, null);
    assert.throws(() => directory.canViewChannel(GUILD_ID, "42", partial), /member 501 snapshot is partial/);

    const member = guild.members.cache.get("500");
    assert.ok(member);
    assert.throws(() => directory.canViewChannel(GUILD_ID, "55", member), /channel 55 is no longer watchable/);
  });
});

test("getCachedOutputChannel marks only text-like channels as postable", async () => {
  await withDirectory(({ directory }) => {
    const text = directory.getCachedOutputChannel("42");
    assert.equal(text?.id, "42");
    assert.equal(text?.postable, true);

    const news = directory.getCachedOutputChannel("43");
    assert.equal(news?.postable, true);

    assert.deepEqual(directory.getCachedOutputChannel("55"), { id: "55", postable: false, kind: "GuildVoice" });
    assert.deepEqual(directory.getCachedOutputChannel("44"), { id: "44", postable: false, kind: "GuildCategory" });
    assert.equal(directory.getCachedOutputChannel("77"), null);
  });
});

test("member lookups use the cache and report uncached guilds as not found", async () => {
  await withDirectory(async ({ directory }) => {
    assert.equal(directory.isMemberCached(GUILD_ID, "500"), true);
    assert.equal(directory.isMemberCached(GUILD_ID, "700"), false);
    assert.equal(directory.isMemberCached("2", "500"), false);
    assert.equal(await directory.fetchMember("2", "700"), "not_found");
  });
});

test("event mappers take names from members, then the user cache, then the id", async () => {
  await withDirectory(({ client, guild }) => {
    const alice = guild.members.cache.get("500");
    assert.ok(alice);
    assert.deepEqual(toMemberJoinEvent(alice), {
      guild: { id: GUILD_ID, name: "G" },
      subject: { id: "500", name: "alice" }
    });

    client.users["_add"](rawUser("600", "carol"));
    const carolBefore = guild.voiceStates["_add"]({ user_id: "600", channel_id: null }, false);
    const carolAfter = guild.voiceStates["_add"]({ user_id: "600", channel_id: "55" }, false);
    assert.deepEqual(toVoiceStateUpdateEvent(carolBefore, carolAfter), {
      guild: { id: GUILD_ID, name: "G" },
      subject: { id: "600", name: "carol" },
      before: null,
      after: { id: "55", name: "Lounge" }
    });

    const strangerBefore = guild.voiceStates["_add"]({ user_id: "601", channel_id: "55" }, false);
    const strangerAfter = guild.voiceStates["_add"]({ user_id: "601", channel_id: null }, false);
    assert.deepEqual(toVoiceStateUpdateEvent(strangerBefore, strangerAfter), {
      guild: { id: GUILD_ID, name: "G" },
      subject: { id: "601", name: "601" },
      before: { id: "55", name: "Lounge" },
      after: null
    });
  });
});
