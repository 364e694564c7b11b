/**
 * Threadkeeper — src/features/escalation/evaluator.ts
 * WHAT: Pure (age, stage, thresholds, offset) → action.
 * WHY: Kept free of I/O so the tier rules can be tested as a truth table.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { EscalationAction, EscalationStage, GuildEscalationSettings } from "./types.js";

type Thresholds = Pick<GuildEscalationSettings, "tier1ThresholdHours" | "tier2ThresholdHours">;

/**
 * Tier 2 wins when both thresholds are crossed, so a thread first seen past
 * tier 2 skips straight to it. Only ever called for unsuppressed threads.
 *
 * @param offsetHours added to both thresholds (hybrid community delay)
 */
export function evaluateEscalation(
  ageHours: number,
  stage: EscalationStage,
  settings: Thresholds,
  offsetHours = 0
): EscalationAction {
  if (stage !== "both_fired" && ageHours >= settings.tier2ThresholdHours + offsetHours) {
    return "tier2";
  }
  if (stage === "unset" && ageHours >= settings.tier1ThresholdHours + offsetHours) {
    return "tier1";
  }
  return "none";
}

/**
 * Smallest age at which anything could still fire for this stage, used to
 * skip the history read on young threads. Assumes offset 0, the lowest any
 * verdict produces.
 */
export function minimumFiringAgeHours(stage: EscalationStage, settings: Thresholds): number {
  switch (stage) {
    case "unset":
      return settings.tier1ThresholdHours;
    case "tier1_fired":
      return settings.tier2ThresholdHours;
    case "both_fired":
      return Number.POSITIVE_INFINITY;
  }
}
