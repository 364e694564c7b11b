/**
 * Threadkeeper — src/features/escalation/sweep.ts
 * WHAT: One escalation pass over every guild → monitored forum → active thread.
 * WHY: Stale unanswered threads page tier 1 in-thread, then tier 2 in the escalation channel.
 * FLOWS:
 *  - guild: settings absent/disabled → skip; no monitored forums → skip
 *  - guild: one active-thread listing, grouped by parent forum
 *  - thread: archived/locked → skip; both_fired/too young → skip the history read
 *  - classify history → evaluate → send alert → mark tier (only after the send succeeds)
 *
 * Errors are contained per thread and guild; a tick never throws on
 * their account. A crash between send and mark can repeat one alert next tick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { HOUR_MS } from "../../lib/constants.js";
import { classifyError, errorContext, failureClass } from "../../lib/errors.js";
import { logger, redact } from "../../lib/logger.js";
import type { GuildConfig, GuildConfigReader } from "../../config/guildConfigStore.js";
import { buildTier1Alert, buildTier2Alert } from "./alerts.js";
import { classifyReplies } from "./classifier.js";
import { evaluateEscalation, minimumFiringAgeHours } from "./evaluator.js";
import type { EscalationPlatform, ForumThread } from "./platform.js";
import type { EscalationStore, GuildEscalationSettings, ReplyVerdict } from "./types.js";

export interface SweepDeps {
  platform: EscalationPlatform;
  store: EscalationStore;
  configs: GuildConfigReader;
}

export interface SweepSummary {
  guildsChecked: number;
  threadsChecked: number;
  suppressed: number;
  tier1Fired: number;
  tier2Fired: number;
  failures: number;
}

function emptySummary(): SweepSummary {
  return { guildsChecked: 0, threadsChecked: 0, suppressed: 0, tier1Fired: 0, tier2Fired: 0, failures: 0 };
}

/**
 * Logs a contained failure. Forbidden/NotFound are operational (warn); the rest
 * go out at error level, which also reaches Sentry via the logger hook.
 */
function recordFailure(summary: SweepSummary, err: unknown, context: Record<string, string>, what: string): void {
  summary.failures++;
  const classified = classifyError(err);
  const failure = failureClass(classified);
  const fields = { ...errorContext(classified, context), failure };

  if (failure === "access_denied" || failure === "not_found") {
    logger.warn(fields, `[escalation] ${what} skipped: ${failure}`);
  } else {
    logger.error({ ...fields, err }, `[escalation] ${what} failed`);
  }
}

async function classifyThread(
  thread: ForumThread,
  settings: GuildEscalationSettings,
  config: GuildConfig,
  deps: SweepDeps,
  knownCommunityReplyAt: number | null
): Promise<ReplyVerdict> {
  // Nobody can ever count as support; reading history would change nothing
  if (settings.behavior === "support_only" && config.supportRoleIds.length === 0) {
    return { kind: "open", offsetHours: 0, degraded: false };
  }

  return classifyReplies(deps.platform.fetchHistory(thread.guildId, thread.id), {
    threadId: thread.id,
    ownerId: thread.ownerId,
    supportRoleIds: new Set(config.supportRoleIds),
    behavior: settings.behavior,
    communityDelayHours: settings.communityDelayHours,
    knownCommunityReplyAt,
  });
}

async function checkThread(
  thread: ForumThread,
  settings: GuildEscalationSettings,
  config: GuildConfig,
  deps: SweepDeps,
  now: Date,
  summary: SweepSummary
): Promise<void> {
  if (thread.archived || thread.locked) return;

  summary.threadsChecked++;

  const ageHours = (now.getTime() - thread.createdAt.getTime()) / HOUR_MS;

  const state = deps.store.getState(thread.id);
  const stage = state?.stage ?? "unset";
  if (ageHours < minimumFiringAgeHours(stage, settings)) return;

  const verdict = await classifyThread(thread, settings, config, deps, state?.lastCommunityReplyAt ?? null);
  if (verdict.kind === "suppressed") {
    summary.suppressed++;
    logger.debug({ threadId: thread.id, reason: verdict.reason }, "[escalation] thread answered");
    return;
  }

  const action = evaluateEscalation(ageHours, stage, settings, verdict.offsetHours);
  const key = { guildId: thread.guildId, threadId: thread.id };
  // Thread titles are user text
  const threadName = redact(thread.name);

  if (action === "tier2") {
    await deps.platform.sendAlert(
      { guildId: thread.guildId, channelId: settings.escalationChannelId, roleId: settings.tier2RoleId },
      buildTier2Alert(thread, settings)
    );
    deps.store.markTierExecuted(key, 2);
    summary.tier2Fired++;
    logger.info(
      { ...key, threadName, ageHours: Math.round(ageHours * 10) / 10, stage, degraded: verdict.degraded },
      "[escalation] tier 2 fired"
    );
  } else if (action === "tier1") {
    await deps.platform.sendAlert(
      { guildId: thread.guildId, channelId: thread.id, roleId: settings.tier1RoleId },
      buildTier1Alert(thread, settings, now)
    );
    deps.store.markTierExecuted(key, 1);
    summary.tier1Fired++;
    logger.info(
      { ...key, threadName, ageHours: Math.round(ageHours * 10) / 10, degraded: verdict.degraded },
      "[escalation] tier 1 fired"
    );
  }
}

async function sweepGuild(guildId: string, deps: SweepDeps, now: Date, summary: SweepSummary): Promise<void> {
  const settings = deps.store.getSettings(guildId);
  if (!settings || !settings.enabled) return;

  const config = deps.configs.getGuildConfig(guildId);
  if (!config || config.monitoredChannelIds.length === 0) return;

  summary.guildsChecked++;

  // One listing per guild; Discord returns every active thread of the guild at once
  const byForum = new Map<string, ForumThread[]>();
  for (const forumId of config.monitoredChannelIds) byForum.set(forumId, []);
  for (const thread of await deps.platform.listActiveThreads(guildId)) {
    byForum.get(thread.parentId)?.push(thread);
  }

  for (const [forumId, threads] of byForum) {
    for (const thread of threads) {
      try {
        await checkThread(thread, settings, config, deps, now, summary);
      } catch (err) {
        recordFailure(summary, err, { guildId, forumId, threadId: thread.id }, "thread");
      }
    }
  }
}

export async function runEscalationSweep(deps: SweepDeps, now: Date = new Date()): Promise<SweepSummary> {
  const summary = emptySummary();

  for (const guildId of deps.platform.listGuildIds()) {
    try {
      await sweepGuild(guildId, deps, now, summary);
    } catch (err) {
      recordFailure(summary, err, { guildId }, "guild");
    }
  }

  logger.info(summary, "[escalation] sweep completed");
  return summary;
}
