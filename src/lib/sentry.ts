/**
 * Threadkeeper — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture/breadcrumbs.
 * WHY: Centralizes error tracking with safe shutdown and guardrails when DSN is invalid.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { env } from "./env.js";
import { logger } from "./logger.js";

let sentryEnabled = false;

/**
 * Structural DSN check: https://{key}@{org}.ingest.sentry.io/{project}.
 * Catches typos early without a network round trip.
 */
function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

// Release tag comes from package.json
function getVersion(): string {
  try {
    const packagePath = path.join(process.cwd(), "package.json");
    const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    if (
      packageJson &&
      typeof packageJson === "object" &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates if SENTRY_DSN is valid and we're not running under Vitest.
 */
export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) {
    return;
  }

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
      release: `threadkeeper@${getVersion()}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,

      // Discord bot tokens must never leave the process
      beforeSend(event) {
        if (event.message) {
          event.message = event.message.replace(
            /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g,
            "[REDACTED_TOKEN]"
          );
        }
        return event;
      },

      // Discord API errors are logged with richer context; network blips aren't actionable
      ignoreErrors: ["DiscordAPIError", "AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],

      debug: env.NODE_ENV === "development",
    });

    sentryEnabled = true;
    logger.info({ environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV }, "Sentry initialized");
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Capture an exception in Sentry. Returns the event id, or null when disabled.
 */
export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;

  Sentry.addBreadcrumb(breadcrumb);
}

export function setTag(key: string, value: string): void {
  if (!sentryEnabled) return;

  Sentry.setTag(key, value);
}

/**
 * Flush any pending events (use before shutdown)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.warn({ err }, "Failed to flush Sentry events");
    return false;
  }
}
