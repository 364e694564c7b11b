/**
 * Threadkeeper — src/events/replyGuard.ts
 * WHAT: Restricts who may reply in monitored forum threads.
 * WHY: In support_only forums only the poster and support staff talk; everything
 *      else is removed and the author is told why by DM.
 * FLOWS:
 *  - messageCreate → monitored thread? → owner/support/bot? keep
 *  - escalation behavior lets community replies count? keep
 *  - else delete → DM notice (if enabled for the guild)
 * SECURITY:
 *  - DM uses SAFE_ALLOWED_MENTIONS; thread names are user text
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, type Message } from "discord.js";
import { ERROR_COLOR, SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import { classifyError, errorContext, failureClass } from "../lib/errors.js";
import { logger, redact } from "../lib/logger.js";
import type { GuildConfigReader } from "../config/guildConfigStore.js";
import { isSupportAuthor } from "../features/escalation/classifier.js";
import type { EscalationBehavior, EscalationStore } from "../features/escalation/types.js";
import { monitoredReplyConfig, threadReplyFromMessage, type ThreadReply } from "./escalationReplyReset.js";

export interface ReplyGuardDeps {
  configs: GuildConfigReader;
  store: Pick<EscalationStore, "getSettings">;
}

export type GuardOutcome = "removed" | "kept";

/**
 * Under community_friendly and hybrid, community replies feed escalation, so
 * the guard stands down.
 */
export function guardApplies(behavior: EscalationBehavior | null): boolean {
  return behavior === null || behavior === "support_only";
}

export function shouldRemoveReply(reply: ThreadReply, deps: ReplyGuardDeps): boolean {
  const config = monitoredReplyConfig(reply, deps.configs);
  if (!config) return false;
  if (isSupportAuthor(reply.authorRoleIds, new Set(config.supportRoleIds))) return false;

  const settings = deps.store.getSettings(reply.guildId);
  return guardApplies(settings?.behavior ?? null);
}

export function buildRemovalNotice(threadName: string, guildName: string): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("Message Removed")
    .setDescription(
      `Your message in the thread \`${threadName.replace(/`/g, "'")}\` was automatically removed.\n\n` +
        `In this server, replies in monitored forum posts are restricted to the original poster ` +
        `and designated support roles to keep the discussion focused.\n\n` +
        `If you believe this was an error, please contact a server moderator.`
    )
    .setColor(ERROR_COLOR)
    .setFooter({ text: `Server: ${guildName}` });
}

/**
 * Runs before the escalation listener. "kept" means the message stands and
 * should be treated as a reply.
 */
export async function enforceReplyGuard(message: Message, deps: ReplyGuardDeps): Promise<GuardOutcome> {
  const reply = threadReplyFromMessage(message);
  if (!reply || !shouldRemoveReply(reply, deps)) return "kept";

  const ctx = { guildId: reply.guildId, threadId: reply.threadId, authorId: reply.authorId };

  try {
    await message.delete();
    logger.info({ ...ctx, threadName: redact(reply.threadName) }, "[replyGuard] removed reply from non-support member");
  } catch (err) {
    const classified = classifyError(err);
    const failure = failureClass(classified);
    if (failure === "access_denied") {
      logger.error(errorContext(classified, ctx), "[replyGuard] cannot delete reply: missing permissions");
      return "kept";
    }
    if (failure === "not_found") {
      // Already gone
      return "removed";
    }
    throw err;
  }

  const config = deps.configs.getCachedGuildConfig(reply.guildId);
  if (config?.dmNotificationsEnabled) {
    try {
      await message.author.send({
        embeds: [buildRemovalNotice(reply.threadName, message.guild?.name ?? "Unknown")],
        allowedMentions: SAFE_ALLOWED_MENTIONS,
      });
    } catch (err) {
      logger.warn({ ...ctx, err }, "[replyGuard] could not DM author (DMs likely closed)");
    }
  }

  return "removed";
}
