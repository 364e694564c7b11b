/**
 * Threadkeeper — tests/features/escalation/classifier.test.ts
 * WHAT: classifyReplies across the three behavior policies.
 * WHY: Suppression decides whether anyone gets paged.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { classifyReplies, type ClassifyContext } from "../../../src/features/escalation/classifier.js";
import type { HistoryMessage } from "../../../src/features/escalation/types.js";
import { createDiscordAPIError } from "../../utils/discordMocks.js";

const OWNER = "owner";
const SUPPORT_ROLE = "support-role";

function msg(authorId: string, roles: string[] = [], bot = false): HistoryMessage {
  return { authorId, authorRoleIds: roles, authorIsBot: bot, createdAt: new Date(0) };
}

async function* stream(messages: HistoryMessage[], failAfter?: number): AsyncGenerator<HistoryMessage> {
  let i = 0;
  for (const m of messages) {
    if (failAfter !== undefined && i === failAfter) throw createDiscordAPIError(50001, "Missing Access", 403);
    i++;
    yield m;
  }
  if (failAfter !== undefined && i === failAfter) throw createDiscordAPIError(50001, "Missing Access", 403);
}

function ctx(overrides: Partial<ClassifyContext> = {}): ClassifyContext {
  return {
    threadId: "thread",
    ownerId: OWNER,
    supportRoleIds: new Set([SUPPORT_ROLE]),
    behavior: "support_only",
    communityDelayHours: 12,
    ...overrides,
  };
}

describe("classifyReplies", () => {
  describe("support_only", () => {
    it("suppresses on a support reply anywhere in history", async () => {
      const history = [msg(OWNER), msg("member"), msg("helper", [SUPPORT_ROLE]), msg(OWNER)];
      expect(await classifyReplies(stream(history), ctx())).toEqual({ kind: "suppressed", reason: "support_reply" });
    });

    it("stays open with only owner, bot and community messages", async () => {
      const history = [msg(OWNER), msg("bot", [SUPPORT_ROLE], true), msg("member", ["other-role"])];
      expect(await classifyReplies(stream(history), ctx())).toEqual({ kind: "open", offsetHours: 0, degraded: false });
    });

    it("ignores the owner even when they hold a support role", async () => {
      const history = [msg(OWNER, [SUPPORT_ROLE])];
      expect(await classifyReplies(stream(history), ctx())).toEqual({ kind: "open", offsetHours: 0, degraded: false });
    });

    it("is open for an empty history", async () => {
      expect(await classifyReplies(stream([]), ctx())).toEqual({ kind: "open", offsetHours: 0, degraded: false });
    });

    it("stops reading at the first suppressing message", async () => {
      const history = [msg("helper", [SUPPORT_ROLE])];
      // The stream would fail on the second read
      expect(await classifyReplies(stream(history, 1), ctx())).toEqual({
        kind: "suppressed",
        reason: "support_reply",
      });
    });
  });

  describe("community_friendly", () => {
    it("suppresses on any non-owner human reply", async () => {
      const history = [msg(OWNER), msg("member")];
      expect(await classifyReplies(stream(history), ctx({ behavior: "community_friendly" }))).toEqual({
        kind: "suppressed",
        reason: "community_reply",
      });
    });

    it("reports support_reply when the first reply is from support", async () => {
      const history = [msg("helper", [SUPPORT_ROLE])];
      expect(await classifyReplies(stream(history), ctx({ behavior: "community_friendly" }))).toEqual({
        kind: "suppressed",
        reason: "support_reply",
      });
    });

    it("bots don't count", async () => {
      const history = [msg("bot", [], true)];
      expect(await classifyReplies(stream(history), ctx({ behavior: "community_friendly" }))).toEqual({
        kind: "open",
        offsetHours: 0,
        degraded: false,
      });
    });
  });

  describe("hybrid", () => {
    it("suppresses on support", async () => {
      const history = [msg("member"), msg("helper", [SUPPORT_ROLE])];
      expect(await classifyReplies(stream(history), ctx({ behavior: "hybrid" }))).toEqual({
        kind: "suppressed",
        reason: "support_reply",
      });
    });

    it("applies the community delay after a community reply", async () => {
      const history = [msg(OWNER), msg("member")];
      expect(await classifyReplies(stream(history), ctx({ behavior: "hybrid" }))).toEqual({
        kind: "open",
        offsetHours: 12,
        degraded: false,
      });
    });

    it("applies the delay from a recorded community reply", async () => {
      expect(
        await classifyReplies(stream([msg(OWNER)]), ctx({ behavior: "hybrid", knownCommunityReplyAt: 1_000 }))
      ).toEqual({ kind: "open", offsetHours: 12, degraded: false });
    });

    it("has no offset without community activity", async () => {
      expect(await classifyReplies(stream([msg(OWNER)]), ctx({ behavior: "hybrid" }))).toEqual({
        kind: "open",
        offsetHours: 0,
        degraded: false,
      });
    });
  });

  describe("unreadable history", () => {
    it("fails open with degraded set", async () => {
      expect(await classifyReplies(stream([msg("member")], 1), ctx())).toEqual({
        kind: "open",
        offsetHours: 0,
        degraded: true,
      });
    });

    it("fails open even under hybrid with community activity", async () => {
      expect(await classifyReplies(stream([msg("member")], 1), ctx({ behavior: "hybrid" }))).toEqual({
        kind: "open",
        offsetHours: 0,
        degraded: true,
      });
    });
  });
});
