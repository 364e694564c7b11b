/**
 * Threadkeeper — src/features/escalation/types.ts
 * WHAT: Shared types for escalation settings, per-thread state and verdicts.
 * WHY: The store, classifier, evaluator and sweep all speak these shapes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const ESCALATION_BEHAVIORS = ["support_only", "community_friendly", "hybrid"] as const;

/**
 * How replies suppress escalation:
 *  - support_only: only a support-role reply counts
 *  - community_friendly: any non-owner human reply counts
 *  - hybrid: support reply counts; a community reply pushes both thresholds out
 */
export type EscalationBehavior = (typeof ESCALATION_BEHAVIORS)[number];

export type EscalationTier = 1 | 2;

/** Per-thread progress. Tier 2 can only be reached through (or alongside) tier 1. */
export type EscalationStage = "unset" | "tier1_fired" | "both_fired";

export type EscalationAction = "none" | "tier1" | "tier2";

export interface GuildEscalationSettings {
  guildId: string;
  tier1ThresholdHours: number;
  tier1RoleId: string;
  tier2ThresholdHours: number;
  tier2RoleId: string;
  escalationChannelId: string;
  enabled: boolean;
  behavior: EscalationBehavior;
  communityDelayHours: number;
}

export interface ThreadEscalationState {
  threadId: string;
  guildId: string;
  stage: EscalationStage;
  /** Epoch ms; only recorded under the hybrid policy */
  lastReplyAt: number | null;
  lastCommunityReplyAt: number | null;
  lastSupportReplyAt: number | null;
}

export interface ThreadKey {
  guildId: string;
  threadId: string;
}

export type ReplyKind = "community" | "support";

export interface EscalationStateCounts {
  tier1Only: number;
  bothFired: number;
}

/**
 * Persistence seam for the sweep and the listener. Synchronous because the
 * backing store is better-sqlite3.
 */
export interface EscalationStore {
  getSettings(guildId: string): GuildEscalationSettings | null;
  getState(threadId: string): ThreadEscalationState | null;
  markTierExecuted(key: ThreadKey, tier: EscalationTier): void;
  resetState(threadId: string): boolean;
  resetAllStates(guildId: string): number;
  recordReplyActivity(key: ThreadKey, kind: ReplyKind, at: number): void;
  countStates(guildId: string): EscalationStateCounts;
}

/** One message from a thread's history, stripped to what classification reads */
export interface HistoryMessage {
  authorId: string;
  authorRoleIds: readonly string[];
  authorIsBot: boolean;
  createdAt: Date;
}

export type SuppressReason = "support_reply" | "community_reply";

export type ReplyVerdict =
  | { kind: "suppressed"; reason: SuppressReason }
  | { kind: "open"; offsetHours: number; degraded: boolean };
