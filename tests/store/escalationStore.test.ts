/**
 * Threadkeeper — tests/store/escalationStore.test.ts
 * WHAT: SqliteEscalationStore against an in-memory database.
 * WHY: Idempotent marking, monotonic stages and scoped resets are what keep
 *      alerts from repeating; the SQL carries those guarantees.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import type Database from "better-sqlite3";
import { ZodError } from "zod";
import { SqliteEscalationStore } from "../../src/store/escalationStore.js";
import {
  createTestDb,
  defaultSettingsInput,
  ESCALATION_CHANNEL_ID,
  GUILD_ID,
  OTHER_GUILD_ID,
  TIER1_ROLE_ID,
  TIER2_ROLE_ID,
} from "../utils/dbFixtures.js";

const THREAD = { guildId: GUILD_ID, threadId: "500000000000000001" };

describe("SqliteEscalationStore", () => {
  let db: Database.Database;
  let store: SqliteEscalationStore;

  beforeEach(() => {
    db = createTestDb();
    store = new SqliteEscalationStore(db);
  });

  describe("settings", () => {
    it("returns null when the guild has no settings", () => {
      expect(store.getSettings(GUILD_ID)).toBeNull();
    });

    it("saves settings with defaults applied", () => {
      store.setSettings(defaultSettingsInput());

      expect(store.getSettings(GUILD_ID)).toEqual({
        guildId: GUILD_ID,
        tier1ThresholdHours: 24,
        tier1RoleId: TIER1_ROLE_ID,
        tier2ThresholdHours: 48,
        tier2RoleId: TIER2_ROLE_ID,
        escalationChannelId: ESCALATION_CHANNEL_ID,
        enabled: true,
        behavior: "support_only",
        communityDelayHours: 12,
      });
    });

    it("replaces settings wholesale", () => {
      store.setSettings(defaultSettingsInput({ behavior: "hybrid", communityDelayHours: 6 }));
      store.setSettings(defaultSettingsInput({ tier1ThresholdHours: 2, tier2ThresholdHours: 3 }));

      const settings = store.getSettings(GUILD_ID);
      expect(settings?.tier1ThresholdHours).toBe(2);
      expect(settings?.tier2ThresholdHours).toBe(3);
      expect(settings?.behavior).toBe("support_only");
      expect(settings?.communityDelayHours).toBe(12);
    });

    it("rejects tier 2 not greater than tier 1", () => {
      expect(() => store.setSettings(defaultSettingsInput({ tier1ThresholdHours: 24, tier2ThresholdHours: 24 }))).toThrow(
        ZodError
      );
      expect(store.getSettings(GUILD_ID)).toBeNull();
    });

    it("rejects non-snowflake role ids", () => {
      expect(() => store.setSettings(defaultSettingsInput({ tier1RoleId: "not-a-role" }))).toThrow(ZodError);
    });

    it("the table CHECK backs up the tier invariant", () => {
      db.prepare(`INSERT INTO guild_settings (guild_id) VALUES (?)`).run(GUILD_ID);
      expect(() =>
        db
          .prepare(
            `INSERT INTO guild_escalation_settings
               (guild_id, tier1_hours, tier1_role_id, tier2_hours, tier2_role_id, escalation_channel_id)
             VALUES (?, 10, 'a', 5, 'b', 'c')`
          )
          .run(GUILD_ID)
      ).toThrow(/CHECK constraint failed/);
    });

    it("disableGuildEscalation keeps thresholds and flips enabled", () => {
      store.setSettings(defaultSettingsInput());

      expect(store.disableGuildEscalation(GUILD_ID)).toBe(true);
      expect(store.getSettings(GUILD_ID)).toMatchObject({ enabled: false, tier1ThresholdHours: 24 });
    });

    it("disableGuildEscalation returns false without settings", () => {
      expect(store.disableGuildEscalation(GUILD_ID)).toBe(false);
    });
  });

  describe("markTierExecuted", () => {
    it("absent row reads as null (unset)", () => {
      expect(store.getState(THREAD.threadId)).toBeNull();
    });

    it("tier 1 creates a tier1_fired row", () => {
      store.markTierExecuted(THREAD, 1);
      expect(store.getState(THREAD.threadId)).toMatchObject({ guildId: GUILD_ID, stage: "tier1_fired" });
    });

    it("is idempotent", () => {
      store.markTierExecuted(THREAD, 1);
      store.markTierExecuted(THREAD, 1);
      expect(store.getState(THREAD.threadId)?.stage).toBe("tier1_fired");
      expect(store.countStates(GUILD_ID)).toEqual({ tier1Only: 1, bothFired: 0 });
    });

    it("tier 2 from unset sets both tiers", () => {
      store.markTierExecuted(THREAD, 2);
      expect(store.getState(THREAD.threadId)?.stage).toBe("both_fired");
    });

    it("never moves backwards: tier 1 after tier 2 stays both_fired", () => {
      store.markTierExecuted(THREAD, 2);
      store.markTierExecuted(THREAD, 1);
      expect(store.getState(THREAD.threadId)?.stage).toBe("both_fired");
    });

    it("the table CHECK rejects tier 2 without tier 1", () => {
      expect(() =>
        db
          .prepare(
            `INSERT INTO thread_escalation_state (thread_id, guild_id, tier1_executed, tier2_executed)
             VALUES ('t', 'g', 0, 1)`
          )
          .run()
      ).toThrow(/CHECK constraint failed/);
    });
  });

  describe("resets", () => {
    it("resetState clears both tiers", () => {
      store.markTierExecuted(THREAD, 2);
      expect(store.resetState(THREAD.threadId)).toBe(true);
      expect(store.getState(THREAD.threadId)).toBeNull();
    });

    it("resetState on a missing row is a no-op", () => {
      expect(store.resetState("500000000000000404")).toBe(false);
    });

    it("resetAllStates only touches the calling guild", () => {
      store.markTierExecuted({ guildId: GUILD_ID, threadId: "1" }, 1);
      store.markTierExecuted({ guildId: GUILD_ID, threadId: "2" }, 2);
      store.markTierExecuted({ guildId: GUILD_ID, threadId: "3" }, 1);
      store.markTierExecuted({ guildId: OTHER_GUILD_ID, threadId: "4" }, 1);

      expect(store.resetAllStates(GUILD_ID)).toBe(3);
      expect(store.resetAllStates(GUILD_ID)).toBe(0);
      expect(store.getState("4")?.stage).toBe("tier1_fired");
    });
  });

  describe("recordReplyActivity", () => {
    it("records community activity without changing the stage", () => {
      store.markTierExecuted(THREAD, 1);
      store.recordReplyActivity(THREAD, "community", 1_700_000_000_000);

      expect(store.getState(THREAD.threadId)).toEqual({
        threadId: THREAD.threadId,
        guildId: GUILD_ID,
        stage: "tier1_fired",
        lastReplyAt: 1_700_000_000_000,
        lastCommunityReplyAt: 1_700_000_000_000,
        lastSupportReplyAt: null,
      });
    });

    it("creates an unset row when none exists", () => {
      store.recordReplyActivity(THREAD, "support", 42);
      expect(store.getState(THREAD.threadId)).toMatchObject({
        stage: "unset",
        lastSupportReplyAt: 42,
        lastCommunityReplyAt: null,
      });
    });

    it("keeps the other kind's timestamp", () => {
      store.recordReplyActivity(THREAD, "community", 10);
      store.recordReplyActivity(THREAD, "support", 20);
      expect(store.getState(THREAD.threadId)).toMatchObject({
        lastReplyAt: 20,
        lastCommunityReplyAt: 10,
        lastSupportReplyAt: 20,
      });
    });
  });

  describe("countStates", () => {
    it("returns zeros for an empty guild", () => {
      expect(store.countStates(GUILD_ID)).toEqual({ tier1Only: 0, bothFired: 0 });
    });

    it("counts tier1-only and both-fired rows", () => {
      store.markTierExecuted({ guildId: GUILD_ID, threadId: "1" }, 1);
      store.markTierExecuted({ guildId: GUILD_ID, threadId: "2" }, 2);
      store.recordReplyActivity({ guildId: GUILD_ID, threadId: "3" }, "community", 1);
      expect(store.countStates(GUILD_ID)).toEqual({ tier1Only: 1, bothFired: 1 });
    });
  });
});
