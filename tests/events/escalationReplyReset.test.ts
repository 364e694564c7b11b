/**
 * Threadkeeper — tests/events/escalationReplyReset.test.ts
 * WHAT: Live replies, archives and deletes against a real in-memory store.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import type Database from "better-sqlite3";
import { GuildConfigStore } from "../../src/config/guildConfigStore.js";
import { SqliteEscalationStore } from "../../src/store/escalationStore.js";
import {
  handleEscalationReply,
  handleThreadArchived,
  handleThreadDeleted,
  threadReplyFromMessage,
  type ReplyListenerDeps,
  type ThreadReply,
} from "../../src/events/escalationReplyReset.js";
import {
  BYSTANDER_ID,
  createTestDb,
  FORUM_ID,
  GUILD_ID,
  HELPER_ID,
  OWNER_ID,
  seedEscalationSettings,
  SUPPORT_ROLE_ID,
} from "../utils/dbFixtures.js";
import { createMockThread, createThreadMessage } from "../utils/discordMocks.js";

const THREAD_ID = "500000000000000001";
const KEY = { guildId: GUILD_ID, threadId: THREAD_ID };
const REPLY_AT = new Date("2026-01-02T00:00:00Z");

function reply(overrides: Partial<ThreadReply> = {}): ThreadReply {
  return {
    messageId: "600000000000000001",
    guildId: GUILD_ID,
    threadId: THREAD_ID,
    threadName: "Printer is on fire",
    parentId: FORUM_ID,
    ownerId: OWNER_ID,
    authorId: BYSTANDER_ID,
    authorIsBot: false,
    authorRoleIds: [],
    createdAt: REPLY_AT,
    ...overrides,
  };
}

describe("threadReplyFromMessage", () => {
  it("reduces a thread message", () => {
    const message = createThreadMessage({ authorId: HELPER_ID, roleIds: [SUPPORT_ROLE_ID] });
    expect(threadReplyFromMessage(message)).toEqual({
      messageId: "600000000000000001",
      guildId: GUILD_ID,
      threadId: THREAD_ID,
      threadName: "Printer is on fire",
      parentId: FORUM_ID,
      ownerId: OWNER_ID,
      authorId: HELPER_ID,
      authorIsBot: false,
      authorRoleIds: [SUPPORT_ROLE_ID],
      createdAt: REPLY_AT,
    });
  });

  it("returns null outside threads", () => {
    const channel = { isThread: () => false };
    const message = { ...createThreadMessage(), channel, inGuild: () => true };
    expect(threadReplyFromMessage(message as unknown as Parameters<typeof threadReplyFromMessage>[0])).toBeNull();
  });

  it("returns null for DMs", () => {
    const message = { ...createThreadMessage(), inGuild: () => false };
    expect(threadReplyFromMessage(message as unknown as Parameters<typeof threadReplyFromMessage>[0])).toBeNull();
  });

  it("treats a member-less author as having no roles", () => {
    expect(threadReplyFromMessage(createThreadMessage())?.authorRoleIds).toEqual([]);
  });

  it("uses the thread from createMockThread", () => {
    const thread = createMockThread({ id: "500000000000000002", parentId: null });
    const result = threadReplyFromMessage(createThreadMessage({ thread }));
    expect(result?.threadId).toBe("500000000000000002");
    expect(result?.parentId).toBeNull();
  });
});

describe("handleEscalationReply", () => {
  let db: Database.Database;
  let store: SqliteEscalationStore;
  let configs: GuildConfigStore;
  let deps: ReplyListenerDeps;

  beforeEach(() => {
    db = createTestDb();
    store = new SqliteEscalationStore(db);
    configs = new GuildConfigStore(db, { cacheTtlMs: 60_000 });
    configs.addMonitoredChannel(GUILD_ID, FORUM_ID);
    configs.addSupportRole(GUILD_ID, SUPPORT_ROLE_ID);
    seedEscalationSettings(db);
    store.markTierExecuted(KEY, 1);
    deps = { store, configs };
  });

  it("support reply resets state", () => {
    const outcome = handleEscalationReply(reply({ authorId: HELPER_ID, authorRoleIds: [SUPPORT_ROLE_ID] }), deps);
    expect(outcome).toBe("reset");
    expect(store.getState(THREAD_ID)).toBeNull();
  });

  it("ignores community replies under support_only", () => {
    expect(handleEscalationReply(reply(), deps)).toBe("ignored");
    expect(store.getState(THREAD_ID)?.stage).toBe("tier1_fired");
  });

  it("ignores the owner, bots and unmonitored forums", () => {
    const support = { authorRoleIds: [SUPPORT_ROLE_ID] };
    expect(handleEscalationReply(reply({ ...support, authorId: OWNER_ID }), deps)).toBe("ignored");
    expect(handleEscalationReply(reply({ ...support, authorIsBot: true }), deps)).toBe("ignored");
    expect(handleEscalationReply(reply({ ...support, parentId: "200000000000000005" }), deps)).toBe("ignored");
    expect(handleEscalationReply(reply({ ...support, parentId: null }), deps)).toBe("ignored");
    expect(store.getState(THREAD_ID)?.stage).toBe("tier1_fired");
  });

  it("community_friendly resets on any human reply", () => {
    seedEscalationSettings(db, { behavior: "community_friendly" });
    expect(handleEscalationReply(reply(), deps)).toBe("reset");
    expect(store.getState(THREAD_ID)).toBeNull();
  });

  it("hybrid records community activity without clearing flags", () => {
    seedEscalationSettings(db, { behavior: "hybrid" });
    expect(handleEscalationReply(reply(), deps)).toBe("recorded");

    const state = store.getState(THREAD_ID);
    expect(state?.stage).toBe("tier1_fired");
    expect(state?.lastCommunityReplyAt).toBe(REPLY_AT.getTime());
    expect(state?.lastReplyAt).toBe(REPLY_AT.getTime());
  });

  it("hybrid support reply resets flags and records support activity", () => {
    seedEscalationSettings(db, { behavior: "hybrid" });
    handleEscalationReply(reply({ authorId: HELPER_ID, authorRoleIds: [SUPPORT_ROLE_ID] }), deps);

    const state = store.getState(THREAD_ID);
    expect(state?.stage).toBe("unset");
    expect(state?.lastSupportReplyAt).toBe(REPLY_AT.getTime());
    expect(state?.lastCommunityReplyAt).toBeNull();
  });
});

describe("thread lifecycle", () => {
  let store: SqliteEscalationStore;

  beforeEach(() => {
    const db = createTestDb();
    store = new SqliteEscalationStore(db);
    seedEscalationSettings(db);
    store.markTierExecuted(KEY, 2);
  });

  it("archiving clears state", () => {
    expect(handleThreadArchived({ archived: false }, { id: THREAD_ID, archived: true }, store)).toBe(true);
    expect(store.getState(THREAD_ID)).toBeNull();
  });

  it("other updates leave state alone", () => {
    expect(handleThreadArchived({ archived: true }, { id: THREAD_ID, archived: true }, store)).toBe(false);
    expect(handleThreadArchived({ archived: true }, { id: THREAD_ID, archived: false }, store)).toBe(false);
    expect(store.getState(THREAD_ID)?.stage).toBe("both_fired");
  });

  it("deleting clears state", () => {
    expect(handleThreadDeleted({ id: THREAD_ID }, store)).toBe(true);
    expect(handleThreadDeleted({ id: THREAD_ID }, store)).toBe(false);
  });
});
