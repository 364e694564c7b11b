/**
 * Threadkeeper — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on bad config; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: true outside tests so .env wins over a stale shell environment;
// tests set their own values before importing anything.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw extraction. Every variable gets trimmed to handle stray whitespace in
 * .env files, then everything is validated in one zod pass.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DB_PATH: process.env.DB_PATH?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),
  ESCALATION_INTERVAL_MINUTES: process.env.ESCALATION_INTERVAL_MINUTES?.trim(),
  CONFIG_CACHE_TTL_SECONDS: process.env.CONFIG_CACHE_TTL_SECONDS?.trim(),
};

const schema = z.object({
  // Checked by requireEnv() at login so modules that only read paths/flags
  // can be imported without a token (scripts, tests).
  DISCORD_TOKEN: z.string().optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/data.db"),
  LOG_LEVEL: z.string().optional(),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  // Escalation sweep cadence. One hour matches how coarse the tier thresholds are.
  ESCALATION_INTERVAL_MINUTES: z.coerce.number().int().min(1).default(60),

  // Guild config cache used on the messageCreate hot path
  CONFIG_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(300),
});

/**
 * safeParse collects every issue at once instead of failing on the first.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env = parsed.data;
export type Env = z.infer<typeof schema>;
