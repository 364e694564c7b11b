/**
 * Threadkeeper — src/lib/schedulerHealth.ts
 * WHAT: Health tracking for scheduled background tasks.
 * WHY: A sweep that keeps failing silently is worse than one that crashes; this
 *      counts consecutive failures and raises an error log past a threshold.
 * FLOWS:
 *  - recordSchedulerRun(name, success) → update health state → alert if threshold exceeded
 *  - getSchedulerHealthByName(name) → return single scheduler health
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  /** Scheduler name (e.g., "escalation") */
  name: string;
  /** Timestamp of last run attempt, null if never run */
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Count of consecutive failures since last success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

/** Consecutive failures before emitting an alert log */
export const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const schedulerHealth = new Map<string, SchedulerHealth>();

/**
 * Record a scheduler run result.
 *
 * @example
 * try {
 *   await runEscalationSweep(deps, new Date());
 *   recordSchedulerRun("escalation", true);
 * } catch (err) {
 *   recordSchedulerRun("escalation", false);
 *   logger.error({ err }, "[escalation] sweep failed");
 * }
 */
export function recordSchedulerRun(name: string, success: boolean, now: number = Date.now()): void {
  const health: SchedulerHealth = schedulerHealth.get(name) ?? {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };

  health.lastRunAt = now;
  health.totalRuns++;

  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  schedulerHealth.set(name, health);

  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
        totalRuns: health.totalRuns,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

/** Copy of one scheduler's health, or undefined if it never ran */
export function getSchedulerHealthByName(name: string): SchedulerHealth | undefined {
  const health = schedulerHealth.get(name);
  return health ? { ...health } : undefined;
}

/** Test hook: clean slate between tests */
export function _clearAllSchedulerHealth(): void {
  schedulerHealth.clear();
}
