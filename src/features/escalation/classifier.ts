/**
 * Threadkeeper — src/features/escalation/classifier.ts
 * WHAT: Decides from a thread's history whether escalation is suppressed.
 * WHY: A thread a support member (or, by policy, the community) already answered
 *      shouldn't page anyone.
 * FLOWS:
 *  - classifyReplies(history, ctx) → suppressed(reason) | open(offsetHours, degraded)
 *
 * History is consumed lazily; the scan stops at the first suppressing message
 * so answered threads cost one page of reads at most in the common case.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { classifyError, errorContext } from "../../lib/errors.js";
import type { EscalationBehavior, HistoryMessage, ReplyVerdict } from "./types.js";

export interface ClassifyContext {
  threadId: string;
  ownerId: string | null;
  supportRoleIds: ReadonlySet<string>;
  behavior: EscalationBehavior;
  communityDelayHours: number;
  /** Community reply already recorded by the live listener (hybrid only) */
  knownCommunityReplyAt?: number | null;
}

export function isSupportAuthor(roleIds: readonly string[], supportRoleIds: ReadonlySet<string>): boolean {
  return roleIds.some((id) => supportRoleIds.has(id));
}

export async function classifyReplies(
  history: AsyncIterable<HistoryMessage>,
  ctx: ClassifyContext
): Promise<ReplyVerdict> {
  let communitySeen = false;

  try {
    for await (const message of history) {
      if (message.authorIsBot || message.authorId === ctx.ownerId) continue;

      const support = isSupportAuthor(message.authorRoleIds, ctx.supportRoleIds);
      if (support) {
        return { kind: "suppressed", reason: "support_reply" };
      }

      if (ctx.behavior === "community_friendly") {
        return { kind: "suppressed", reason: "community_reply" };
      }

      communitySeen = true;
    }
  } catch (err) {
    // Fail open: an unreadable thread still escalates
    const classified = classifyError(err);
    logger.warn(
      { threadId: ctx.threadId, ...errorContext(classified) },
      "[escalation] history unreadable, classifying as open"
    );
    return { kind: "open", offsetHours: 0, degraded: true };
  }

  if (ctx.behavior === "hybrid" && (communitySeen || ctx.knownCommunityReplyAt != null)) {
    return { kind: "open", offsetHours: ctx.communityDelayHours, degraded: false };
  }

  return { kind: "open", offsetHours: 0, degraded: false };
}
