/**
 * Threadkeeper — src/db/db.ts
 * WHAT: SQLite connection bootstrap.
 * WHY: Centralizes better-sqlite3 setup and PRAGMAs so consumers can just import `db`.
 * FLOWS:
 *  - Open DB → set PRAGMAs → ensureSchema() → closeDatabase() on shutdown
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous by design; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { ensureSchema } from "./ensure.js";

const DB_BUSY_TIMEOUT_MS = 5000;

const dbPath = env.DB_PATH;
fs.mkdirSync(path.dirname(dbPath), { recursive: true });
export const db = new Database(dbPath, { fileMustExist: false });
// WAL lets the sweep read while message events write
db.pragma("journal_mode = WAL");
db.pragma("synchronous = NORMAL");
db.pragma("foreign_keys = ON");
// Fail-soft during brief contention rather than throwing SQLITE_BUSY immediately
db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
logger.info({ dbPath }, "SQLite opened");

ensureSchema(db);

/**
 * Never throws; shutdown prefers logs over crashes.
 */
export function closeDatabase(): void {
  logger.info("Closing database connection...");
  try {
    db.close();
    logger.info("Database closed successfully");
  } catch (err) {
    logger.error({ err }, "Error closing database");
  }
}
