/**
 * Threadkeeper — src/store/escalationStore.ts
 * WHAT: SQLite storage for per-guild escalation settings and per-thread escalation state.
 * WHY: The sweep and the live listener share one row per thread; upserts keep
 *      repeated marks idempotent across ticks and restarts.
 * FLOWS:
 *  - getSettings(guildId) → settings | null (absent = escalation off)
 *  - markTierExecuted({ guildId, threadId }, 1|2) → upsert flags
 *  - resetState(threadId) / resetAllStates(guildId) → delete rows
 *  - setSettings(input) → validated wholesale replace
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { logger } from "../lib/logger.js";
import { escalationSettingsSchema, type EscalationSettingsInput } from "../features/escalation/settings.js";
import {
  ESCALATION_BEHAVIORS,
  type EscalationBehavior,
  type EscalationStage,
  type EscalationStateCounts,
  type EscalationStore,
  type EscalationTier,
  type GuildEscalationSettings,
  type ReplyKind,
  type ThreadEscalationState,
  type ThreadKey,
} from "../features/escalation/types.js";

// Row shapes as they come back from SQLite. 0/1 for booleans.
interface SettingsRow {
  guild_id: string;
  tier1_hours: number;
  tier1_role_id: string;
  tier2_hours: number;
  tier2_role_id: string;
  escalation_channel_id: string;
  enabled: number;
  behavior: string;
  community_delay_hours: number;
}

interface StateRow {
  thread_id: string;
  guild_id: string;
  tier1_executed: number;
  tier2_executed: number;
  last_reply_at: number | null;
  last_community_reply_at: number | null;
  last_support_reply_at: number | null;
}

function isBehavior(value: string): value is EscalationBehavior {
  return ESCALATION_BEHAVIORS.some((b) => b === value);
}

function stageFromFlags(tier1: number, tier2: number): EscalationStage {
  if (tier2) return "both_fired";
  if (tier1) return "tier1_fired";
  return "unset";
}

export class SqliteEscalationStore implements EscalationStore {
  private readonly database: Database.Database;
  private readonly getSettingsStmt: Database.Statement<[string], SettingsRow>;
  private readonly getStateStmt: Database.Statement<[string], StateRow>;
  private readonly markTier1Stmt: Database.Statement<[string, string]>;
  private readonly markTier2Stmt: Database.Statement<[string, string]>;
  private readonly deleteStateStmt: Database.Statement<[string]>;
  private readonly deleteGuildStatesStmt: Database.Statement<[string]>;
  private readonly countStmt: Database.Statement<[string], { tier1_only: number; both_fired: number }>;

  constructor(database: Database.Database) {
    this.database = database;

    this.getSettingsStmt = database.prepare<[string], SettingsRow>(
      `SELECT guild_id, tier1_hours, tier1_role_id, tier2_hours, tier2_role_id,
              escalation_channel_id, enabled, behavior, community_delay_hours
       FROM guild_escalation_settings WHERE guild_id = ?`
    );

    this.getStateStmt = database.prepare<[string], StateRow>(
      `SELECT thread_id, guild_id, tier1_executed, tier2_executed,
              last_reply_at, last_community_reply_at, last_support_reply_at
       FROM thread_escalation_state WHERE thread_id = ?`
    );

    // Tier 1 on a both_fired row leaves tier2_executed alone
    this.markTier1Stmt = database.prepare<[string, string]>(
      `INSERT INTO thread_escalation_state (thread_id, guild_id, tier1_executed, tier2_executed)
       VALUES (?, ?, 1, 0)
       ON CONFLICT(thread_id) DO UPDATE SET
         tier1_executed = 1,
         updated_at_s = unixepoch()`
    );

    // Tier 2 always implies tier 1, including a direct jump from unset
    this.markTier2Stmt = database.prepare<[string, string]>(
      `INSERT INTO thread_escalation_state (thread_id, guild_id, tier1_executed, tier2_executed)
       VALUES (?, ?, 1, 1)
       ON CONFLICT(thread_id) DO UPDATE SET
         tier1_executed = 1,
         tier2_executed = 1,
         updated_at_s = unixepoch()`
    );

    this.deleteStateStmt = database.prepare<[string]>(
      `DELETE FROM thread_escalation_state WHERE thread_id = ?`
    );

    this.deleteGuildStatesStmt = database.prepare<[string]>(
      `DELETE FROM thread_escalation_state WHERE guild_id = ?`
    );

    this.countStmt = database.prepare<[string], { tier1_only: number; both_fired: number }>(
      `SELECT
         COALESCE(SUM(CASE WHEN tier1_executed = 1 AND tier2_executed = 0 THEN 1 ELSE 0 END), 0) AS tier1_only,
         COALESCE(SUM(CASE WHEN tier2_executed = 1 THEN 1 ELSE 0 END), 0) AS both_fired
       FROM thread_escalation_state WHERE guild_id = ?`
    );
  }

  getSettings(guildId: string): GuildEscalationSettings | null {
    const row = this.getSettingsStmt.get(guildId);
    if (!row) return null;

    if (!isBehavior(row.behavior)) {
      // The CHECK constraint makes this unreachable short of manual edits
      logger.warn({ guildId, behavior: row.behavior }, "[escalationStore] unknown behavior, treating as support_only");
    }

    return {
      guildId: row.guild_id,
      tier1ThresholdHours: row.tier1_hours,
      tier1RoleId: row.tier1_role_id,
      tier2ThresholdHours: row.tier2_hours,
      tier2RoleId: row.tier2_role_id,
      escalationChannelId: row.escalation_channel_id,
      enabled: row.enabled === 1,
      behavior: isBehavior(row.behavior) ? row.behavior : "support_only",
      communityDelayHours: row.community_delay_hours,
    };
  }

  getState(threadId: string): ThreadEscalationState | null {
    const row = this.getStateStmt.get(threadId);
    if (!row) return null;

    return {
      threadId: row.thread_id,
      guildId: row.guild_id,
      stage: stageFromFlags(row.tier1_executed, row.tier2_executed),
      lastReplyAt: row.last_reply_at,
      lastCommunityReplyAt: row.last_community_reply_at,
      lastSupportReplyAt: row.last_support_reply_at,
    };
  }

  markTierExecuted(key: ThreadKey, tier: EscalationTier): void {
    const stmt = tier === 2 ? this.markTier2Stmt : this.markTier1Stmt;
    try {
      stmt.run(key.threadId, key.guildId);
      logger.debug({ ...key, tier }, "[escalationStore] tier marked");
    } catch (err) {
      logger.error({ err, ...key, tier }, "[escalationStore] failed to mark tier");
      throw err;
    }
  }

  resetState(threadId: string): boolean {
    const result = this.deleteStateStmt.run(threadId);
    if (result.changes > 0) {
      logger.debug({ threadId }, "[escalationStore] state reset");
    }
    return result.changes > 0;
  }

  resetAllStates(guildId: string): number {
    const result = this.deleteGuildStatesStmt.run(guildId);
    logger.info({ guildId, removed: result.changes }, "[escalationStore] all states reset");
    return result.changes;
  }

  /**
   * Upserts reply timestamps without touching the tier flags. A new row starts
   * at stage unset.
   */
  recordReplyActivity(key: ThreadKey, kind: ReplyKind, at: number): void {
    const column = kind === "support" ? "last_support_reply_at" : "last_community_reply_at";
    this.database
      .prepare<[string, string, number, number]>(
        `INSERT INTO thread_escalation_state (thread_id, guild_id, last_reply_at, ${column})
         VALUES (?, ?, ?, ?)
         ON CONFLICT(thread_id) DO UPDATE SET
           last_reply_at = excluded.last_reply_at,
           ${column} = excluded.${column},
           updated_at_s = unixepoch()`
      )
      .run(key.threadId, key.guildId, at, at);
  }

  countStates(guildId: string): EscalationStateCounts {
    const row = this.countStmt.get(guildId);
    return { tier1Only: row?.tier1_only ?? 0, bothFired: row?.both_fired ?? 0 };
  }

  /**
   * Validated wholesale replace. The guild_settings parent row is created if
   * missing so the foreign key holds.
   *
   * @throws ZodError when the input breaks an invariant (e.g. tier2 <= tier1)
   */
  setSettings(input: EscalationSettingsInput): GuildEscalationSettings {
    const s = escalationSettingsSchema.parse(input);

    const write = this.database.transaction(() => {
      this.database
        .prepare<[string]>(`INSERT OR IGNORE INTO guild_settings (guild_id) VALUES (?)`)
        .run(s.guildId);
      this.database
        .prepare<[string, number, string, number, string, string, number, string, number]>(
          `INSERT INTO guild_escalation_settings
             (guild_id, tier1_hours, tier1_role_id, tier2_hours, tier2_role_id,
              escalation_channel_id, enabled, behavior, community_delay_hours)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(guild_id) DO UPDATE SET
             tier1_hours = excluded.tier1_hours,
             tier1_role_id = excluded.tier1_role_id,
             tier2_hours = excluded.tier2_hours,
             tier2_role_id = excluded.tier2_role_id,
             escalation_channel_id = excluded.escalation_channel_id,
             enabled = excluded.enabled,
             behavior = excluded.behavior,
             community_delay_hours = excluded.community_delay_hours,
             updated_at_s = unixepoch()`
        )
        .run(
          s.guildId,
          s.tier1ThresholdHours,
          s.tier1RoleId,
          s.tier2ThresholdHours,
          s.tier2RoleId,
          s.escalationChannelId,
          s.enabled ? 1 : 0,
          s.behavior,
          s.communityDelayHours
        );
    });
    write();

    logger.info(
      { guildId: s.guildId, tier1: s.tier1ThresholdHours, tier2: s.tier2ThresholdHours, behavior: s.behavior },
      "[escalationStore] settings saved"
    );
    return { ...s };
  }

  /** Flips enabled off, keeping thresholds. Returns false when no settings exist. */
  disableGuildEscalation(guildId: string): boolean {
    const result = this.database
      .prepare<[string]>(
        `UPDATE guild_escalation_settings SET enabled = 0, updated_at_s = unixepoch() WHERE guild_id = ?`
      )
      .run(guildId);
    return result.changes > 0;
  }
}
