/**
 * Threadkeeper — src/scheduler/escalationScheduler.ts
 * WHAT: Periodic driver for the escalation sweep.
 * WHY: Threads go stale without any event firing; only a timer notices.
 * FLOWS:
 *  - start → first sweep after initialDelayMs → every intervalMs
 *  - each tick → runEscalationSweep() → recordSchedulerRun("escalation", ok)
 *  - a tick that arrives while one is running is skipped, not queued
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ESCALATION_INITIAL_DELAY_MS } from "../lib/constants.js";
import { logger } from "../lib/logger.js";
import { getSchedulerHealthByName, recordSchedulerRun } from "../lib/schedulerHealth.js";
import { runEscalationSweep, type SweepDeps, type SweepSummary } from "../features/escalation/sweep.js";

export const ESCALATION_SCHEDULER_NAME = "escalation";

let _activeInterval: NodeJS.Timeout | null = null;
let _initialTimer: NodeJS.Timeout | null = null;
let _tickInFlight = false;

/**
 * One guarded tick. Resolves to null when skipped because the previous tick
 * is still running. Never rejects.
 */
export async function runScheduledSweep(deps: SweepDeps, now: Date = new Date()): Promise<SweepSummary | null> {
  if (_tickInFlight) {
    logger.warn("[escalation] previous sweep still running, skipping tick");
    return null;
  }

  _tickInFlight = true;
  try {
    const summary = await runEscalationSweep(deps, now);
    recordSchedulerRun(ESCALATION_SCHEDULER_NAME, true);
    return summary;
  } catch (err) {
    recordSchedulerRun(ESCALATION_SCHEDULER_NAME, false);
    const health = getSchedulerHealthByName(ESCALATION_SCHEDULER_NAME);
    logger.error(
      { err, consecutiveFailures: health?.consecutiveFailures, lastSuccessAt: health?.lastSuccessAt ?? null },
      "[escalation] sweep failed"
    );
    return null;
  } finally {
    _tickInFlight = false;
  }
}

/**
 * @example
 * // In src/index.ts ClientReady event:
 * startEscalationScheduler({ platform, store, configs }, { intervalMs: env.ESCALATION_INTERVAL_MINUTES * 60_000 });
 */
export function startEscalationScheduler(
  deps: SweepDeps,
  options: { intervalMs: number; initialDelayMs?: number }
): void {
  // Opt-out for tests and one-off maintenance runs
  if (process.env.ESCALATION_SCHEDULER_DISABLED === "1") {
    logger.debug("[escalation] scheduler disabled via env flag");
    return;
  }

  if (_activeInterval) {
    logger.warn("[escalation] scheduler already running");
    return;
  }

  const initialDelayMs = options.initialDelayMs ?? ESCALATION_INITIAL_DELAY_MS;
  logger.info(
    { intervalMinutes: options.intervalMs / 60000, initialDelayMs },
    "[escalation] scheduler starting"
  );

  // Gives the guild cache time to fill after ready
  _initialTimer = setTimeout(() => {
    _initialTimer = null;
    void runScheduledSweep(deps);
  }, initialDelayMs);
  _initialTimer.unref();

  const interval = setInterval(() => {
    void runScheduledSweep(deps);
  }, options.intervalMs);

  // Prevent interval from keeping process alive during shutdown
  interval.unref();

  _activeInterval = interval;
}

export function stopEscalationScheduler(): void {
  if (_initialTimer) {
    clearTimeout(_initialTimer);
    _initialTimer = null;
  }
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
    logger.info("[escalation] scheduler stopped");
  }
}

export function isEscalationSchedulerRunning(): boolean {
  return _activeInterval !== null;
}
