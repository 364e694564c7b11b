/**
 * Threadkeeper — src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * WHY: The sweep and listeners decide between "retry next tick", "skip this
 *      unit" and "report" based on what actually failed.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - failureClass(classified) → access_denied | not_found | transient_store | transient_network | unknown
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, failureClass } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (failureClass(classified) === "access_denied") { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

/**
 * Base error interface for the discriminated union pattern.
 * The `kind` field is the discriminator; it survives module boundaries where
 * instanceof checks on foreign error classes don't.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Database errors (SQLite).
 * SQLITE_BUSY/SQLITE_LOCKED are transient; SQLITE_CONSTRAINT_* are logic errors.
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
  sql?: string;
  table?: string;
}

/**
 * Discord API errors. Discord uses numeric codes, not HTTP status:
 * - 50013: Missing Permissions
 * - 50001: Missing Access (can't see channel)
 * - 10003 / 10004 / 10008 / 10011 / 10013: Unknown channel / guild / message / role / user
 *
 * See: https://discord.com/developers/docs/topics/opcodes-and-status-codes
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** A configured role/channel/guild/thread no longer resolves */
export interface MissingTargetInfo extends AppError {
  kind: "missing_target";
  target: MissingTargetKind;
  targetId: string;
}

/** Node.js system errors: the request never reached Discord or dropped mid-flight */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

/** Config validation errors (zod) */
export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DbError
  | DiscordApiError
  | MissingTargetInfo
  | NetworkError
  | ValidationError
  | UnknownError;

export type MissingTargetKind = "guild" | "channel" | "role" | "thread";

/**
 * Thrown by the platform layer when a configured id resolves to nothing.
 * discord.js returns null for some lookups instead of throwing 10011/10003,
 * so we raise this to keep "deleted role" on the same path as "unknown role".
 */
export class MissingTargetError extends Error {
  readonly target: MissingTargetKind;
  readonly targetId: string;

  constructor(target: MissingTargetKind, targetId: string) {
    super(`Unknown ${target} ${targetId}`);
    this.name = "MissingTargetError";
    this.target = target;
    this.targetId = targetId;
  }
}

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EAI_AGAIN", "EPIPE"];
const ACCESS_DENIED_CODES = [50001, 50013];
const NOT_FOUND_CODES = [10003, 10004, 10008, 10011, 10013];

function readProp(value: unknown, key: string): unknown {
  if (value && typeof value === "object" && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

function readString(value: unknown, key: string): string | undefined {
  const prop = readProp(value, key);
  return typeof prop === "string" ? prop : undefined;
}

function readNumber(value: unknown, key: string): number | undefined {
  const prop = readProp(value, key);
  return typeof prop === "number" ? prop : undefined;
}

// ===== Error Classification =====

/**
 * Classify any caught error into a discriminated union.
 *
 * Ordered from most specific to least: our own MissingTargetError, SQLite,
 * Discord, zod, network, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;
  const message = readString(err, "message") ?? String(err);
  const name = readString(err, "name");
  const code = readProp(err, "code");

  if (err instanceof MissingTargetError) {
    return { kind: "missing_target", target: err.target, targetId: err.targetId, message, cause };
  }

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    const sql = readString(err, "sql");
    return {
      kind: "db_error",
      code: typeof code === "string" ? code : "UNKNOWN",
      message,
      sql,
      table: extractTableFromSql(sql),
      cause,
    };
  }

  if (typeof code === "number" && (name === "DiscordAPIError" || name?.includes("Discord"))) {
    return {
      kind: "discord_api",
      code,
      httpStatus: readNumber(err, "status") ?? readNumber(err, "httpStatus"),
      method: readString(err, "method"),
      path: readString(err, "url") ?? readString(err, "path"),
      message,
      cause,
    };
  }

  if (name === "ZodError") {
    const issues = readProp(err, "issues");
    const first = Array.isArray(issues) ? issues[0] : undefined;
    const issuePath = readProp(first, "path");
    return {
      kind: "validation",
      field: Array.isArray(issuePath) ? issuePath.join(".") : "unknown",
      message: readString(first, "message") ?? message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return { kind: "network", code, host: readString(err, "hostname"), message, cause };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Failure taxonomy used by the escalation sweep and event handlers.
 *
 * access_denied  → log, leave state untouched, retry next tick
 * not_found      → log, skip the unit this tick
 * transient_*    → abort this unit, retry next tick
 */
export type FailureClass =
  | "access_denied"
  | "not_found"
  | "transient_store"
  | "transient_network"
  | "unknown";

export function failureClass(err: ClassifiedError): FailureClass {
  switch (err.kind) {
    case "missing_target":
      return "not_found";
    case "db_error":
      return "transient_store";
    case "network":
      return "transient_network";
    case "discord_api":
      if (ACCESS_DENIED_CODES.includes(err.code)) return "access_denied";
      if (NOT_FOUND_CODES.includes(err.code)) return "not_found";
      if (err.httpStatus === 403) return "access_denied";
      if (err.httpStatus === 404) return "not_found";
      return "unknown";
    default:
      return "unknown";
  }
}

/**
 * Check if error should be reported to Sentry. Operational noise (deleted
 * channels, revoked permissions, network blips) is logged but not reported.
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (failureClass(err)) {
    case "access_denied":
    case "not_found":
    case "transient_network":
      return false;
    default:
      return err.kind !== "validation";
  }
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code, sql: err.sql?.slice(0, 100), table: err.table };
    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };
    case "missing_target":
      return { ...base, target: err.target, targetId: err.targetId };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "validation":
      return { ...base, field: err.field };
    default:
      return base;
  }
}

// ===== Internal Helpers =====

/**
 * Best-effort table name from SQL, purely as a hint in error context.
 */
function extractTableFromSql(sql: string | undefined): string | undefined {
  if (!sql) return undefined;
  const match = sql.match(/(?:FROM|INTO|UPDATE|JOIN)\s+(\w+)/i);
  return match?.[1];
}
