/**
 * Threadkeeper — src/util/ensureEnv.ts
 * WHAT: Fail-fast guard for required environment variables.
 * WHY: A missing token otherwise shows up as discord.js TokenInvalid deep in login().
 * FLOWS: requireEnv(name) → value, or exit(1) with a one-line reason
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || v.trim() === "") {
    console.error(`[fatal] Missing required env: ${name}. Did .env load?`);
    process.exit(1);
  }
  return v.trim();
}
