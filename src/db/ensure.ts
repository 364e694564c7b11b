/**
 * Threadkeeper — src/db/ensure.ts
 * WHAT: Idempotent schema bootstrap for guild config and escalation tables.
 * WHY: We run on existing data without migrations tooling; CREATE IF NOT EXISTS
 *      plus additive ALTERs keep older databases working.
 * FLOWS:
 *  - ensureSchema(db) → create tables/indexes → add columns newer builds expect
 * DOCS:
 *  - CREATE TABLE IF NOT EXISTS: https://sqlite.org/lang_createtable.html
 *  - PRAGMA table_info: https://sqlite.org/pragma.html#pragma_table_info
 *  - SQLite UPSERT: https://sqlite.org/lang_UPSERT.html
 *
 * Takes the handle as a parameter so tests can run it against ":memory:".
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { logger } from "../lib/logger.js";

const SQL_IDENTIFIER_RE = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function hasColumn(database: Database.Database, table: string, column: string): boolean {
  // PRAGMA arguments can't be bound, so validate identifiers instead
  if (!SQL_IDENTIFIER_RE.test(table)) {
    throw new Error(`Invalid table name for schema check: ${table}`);
  }
  if (!SQL_IDENTIFIER_RE.test(column)) {
    throw new Error(`Invalid column name for schema check: ${column}`);
  }

  const rows = database.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return rows.some((r) => r.name === column);
}

function addColumnIfMissing(
  database: Database.Database,
  table: string,
  column: string,
  definition: string
): void {
  if (!hasColumn(database, table, column)) {
    database.prepare(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`).run();
    logger.info({ table, column }, "[ensure] added missing column");
  }
}

/**
 * Guild-level config the reply guard and the sweep read.
 * monitored_channels/support_roles cascade when the guild row goes away.
 */
function ensureGuildConfigTables(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS guild_settings (
      guild_id TEXT PRIMARY KEY,
      dm_notifications_enabled INTEGER NOT NULL DEFAULT 1
    );

    CREATE TABLE IF NOT EXISTS monitored_channels (
      guild_id TEXT NOT NULL REFERENCES guild_settings(guild_id) ON DELETE CASCADE,
      channel_id TEXT NOT NULL,
      PRIMARY KEY (guild_id, channel_id)
    );

    CREATE TABLE IF NOT EXISTS support_roles (
      guild_id TEXT NOT NULL REFERENCES guild_settings(guild_id) ON DELETE CASCADE,
      role_id TEXT NOT NULL,
      PRIMARY KEY (guild_id, role_id)
    );
  `);
}

/**
 * Escalation tables.
 *
 * thread_escalation_state keeps two flags rather than a stage column so the
 * CHECK can state "tier 2 implies tier 1" directly.
 */
function ensureEscalationTables(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS guild_escalation_settings (
      guild_id TEXT PRIMARY KEY REFERENCES guild_settings(guild_id) ON DELETE CASCADE,
      tier1_hours INTEGER NOT NULL CHECK (tier1_hours > 0),
      tier1_role_id TEXT NOT NULL,
      tier2_hours INTEGER NOT NULL,
      tier2_role_id TEXT NOT NULL,
      escalation_channel_id TEXT NOT NULL,
      enabled INTEGER NOT NULL DEFAULT 1,
      behavior TEXT NOT NULL DEFAULT 'support_only'
        CHECK (behavior IN ('support_only', 'community_friendly', 'hybrid')),
      community_delay_hours INTEGER NOT NULL DEFAULT 12,
      updated_at_s INTEGER NOT NULL DEFAULT (unixepoch()),
      CHECK (tier2_hours > tier1_hours)
    );

    CREATE TABLE IF NOT EXISTS thread_escalation_state (
      thread_id TEXT PRIMARY KEY,
      guild_id TEXT NOT NULL,
      tier1_executed INTEGER NOT NULL DEFAULT 0,
      tier2_executed INTEGER NOT NULL DEFAULT 0,
      last_reply_at INTEGER,
      last_community_reply_at INTEGER,
      last_support_reply_at INTEGER,
      updated_at_s INTEGER NOT NULL DEFAULT (unixepoch()),
      CHECK (tier2_executed = 0 OR tier1_executed = 1)
    );

    CREATE INDEX IF NOT EXISTS idx_thread_escalation_state_guild
      ON thread_escalation_state(guild_id);
  `);

  // Databases created before the hybrid policy shipped
  addColumnIfMissing(database, "guild_escalation_settings", "community_delay_hours", "INTEGER NOT NULL DEFAULT 12");
  addColumnIfMissing(database, "thread_escalation_state", "last_community_reply_at", "INTEGER");
  addColumnIfMissing(database, "thread_escalation_state", "last_support_reply_at", "INTEGER");
}

export function ensureSchema(database: Database.Database): void {
  try {
    ensureGuildConfigTables(database);
    ensureEscalationTables(database);
    logger.debug("[ensure] schema ensured");
  } catch (err) {
    logger.error({ err }, "[ensure] failed to ensure schema");
    throw err;
  }
}
