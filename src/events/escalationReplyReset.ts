/**
 * Threadkeeper — src/events/escalationReplyReset.ts
 * WHAT: Live-event side of escalation: replies, archives and deletes reset thread state.
 * WHY: Without this a thread answered between ticks could still escalate on the next one.
 * FLOWS:
 *  - messageCreate in monitored thread → support reply → resetState
 *  - hybrid policy → community reply → recordReplyActivity (pushes thresholds out)
 *  - community_friendly policy → any non-owner human reply → resetState
 *  - threadUpdate archived false→true / threadDelete → resetState
 *
 * Races with the sweep are last-writer-wins on the thread's row.
 * Under hybrid a support reply resets and then records lastSupportReplyAt, leaving a
 * stage-unset row rather than none; the sweep reads both as unset.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Message } from "discord.js";
import { logger } from "../lib/logger.js";
import type { GuildConfig, GuildConfigReader } from "../config/guildConfigStore.js";
import { isSupportAuthor } from "../features/escalation/classifier.js";
import type { EscalationStore } from "../features/escalation/types.js";

/** A message posted in a guild thread, reduced to what the listeners read */
export interface ThreadReply {
  messageId: string;
  guildId: string;
  threadId: string;
  threadName: string;
  parentId: string | null;
  ownerId: string | null;
  authorId: string;
  authorIsBot: boolean;
  authorRoleIds: string[];
  createdAt: Date;
}

export interface ReplyListenerDeps {
  store: EscalationStore;
  configs: GuildConfigReader;
}

export type ReplyOutcome = "reset" | "recorded" | "ignored";

/** null for DMs and non-thread channels */
export function threadReplyFromMessage(message: Message): ThreadReply | null {
  if (!message.inGuild()) return null;
  const channel = message.channel;
  if (!channel.isThread()) return null;

  return {
    messageId: message.id,
    guildId: message.guildId,
    threadId: channel.id,
    threadName: channel.name,
    parentId: channel.parentId,
    ownerId: channel.ownerId,
    authorId: message.author.id,
    authorIsBot: message.author.bot,
    authorRoleIds: message.member ? [...message.member.roles.cache.keys()] : [],
    createdAt: message.createdAt,
  };
}

/** Monitored thread, config loaded, author neither bot nor owner */
export function monitoredReplyConfig(reply: ThreadReply, configs: GuildConfigReader): GuildConfig | null {
  if (reply.authorIsBot || reply.authorId === reply.ownerId) return null;
  if (!reply.parentId) return null;

  const config = configs.getCachedGuildConfig(reply.guildId);
  if (!config || !config.monitoredChannelIds.includes(reply.parentId)) return null;
  return config;
}

export function handleEscalationReply(reply: ThreadReply, deps: ReplyListenerDeps): ReplyOutcome {
  const config = monitoredReplyConfig(reply, deps.configs);
  if (!config) return "ignored";

  const key = { guildId: reply.guildId, threadId: reply.threadId };
  const settings = deps.store.getSettings(reply.guildId);
  const support = isSupportAuthor(reply.authorRoleIds, new Set(config.supportRoleIds));

  if (support) {
    const cleared = deps.store.resetState(reply.threadId);
    if (settings?.behavior === "hybrid") {
      deps.store.recordReplyActivity(key, "support", reply.createdAt.getTime());
    }
    logger.debug({ ...key, authorId: reply.authorId, cleared }, "[escalation] support reply, state reset");
    return "reset";
  }

  if (settings?.behavior === "community_friendly") {
    const cleared = deps.store.resetState(reply.threadId);
    logger.debug({ ...key, authorId: reply.authorId, cleared }, "[escalation] community reply, state reset");
    return "reset";
  }

  if (settings?.behavior === "hybrid") {
    deps.store.recordReplyActivity(key, "community", reply.createdAt.getTime());
    logger.debug({ ...key, authorId: reply.authorId }, "[escalation] community reply recorded");
    return "recorded";
  }

  return "ignored";
}

/** Returns true when the archive transition cleared a row */
export function handleThreadArchived(
  oldThread: { archived: boolean | null },
  newThread: { id: string; archived: boolean | null },
  store: Pick<EscalationStore, "resetState">
): boolean {
  if (oldThread.archived || !newThread.archived) return false;
  const cleared = store.resetState(newThread.id);
  if (cleared) {
    logger.debug({ threadId: newThread.id }, "[escalation] thread archived, state reset");
  }
  return cleared;
}

export function handleThreadDeleted(thread: { id: string }, store: Pick<EscalationStore, "resetState">): boolean {
  const cleared = store.resetState(thread.id);
  if (cleared) {
    logger.debug({ threadId: thread.id }, "[escalation] thread deleted, state reset");
  }
  return cleared;
}
