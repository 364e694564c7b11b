/**
 * Threadkeeper — src/lib/constants.ts
 * WHAT: Shared constants for message options, embed colors and timings.
 * WHY: Keeps magic numbers out of the feature modules.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/**
 * Suppresses all @mentions (users, roles, everyone/here).
 * Used for DMs and anything that quotes user content.
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

// ===== Embed Colors =====

/** Tier 1 alerts and informational DMs */
export const INFO_COLOR = 0x3498db;

/** Tier 2 alerts */
export const ERROR_COLOR = 0xe74c3c;

// ===== Timeouts & Delays =====

export const HOUR_MS = 60 * 60 * 1000;

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** First escalation sweep runs this long after ready, letting the guild cache settle */
export const ESCALATION_INITIAL_DELAY_MS = 15_000;

/** Page size for thread history reads (Discord's maximum) */
export const HISTORY_PAGE_SIZE = 100;
