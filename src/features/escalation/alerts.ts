/**
 * Threadkeeper — src/features/escalation/alerts.ts
 * WHAT: Message payloads for tier 1 (in-thread) and tier 2 (escalation channel) alerts.
 * WHY: The role ping lives in `content`, outside the embed, or Discord won't notify.
 * SECURITY:
 *  - allowedMentions is limited to the tier's role; thread titles are user text
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, type MessageMentionOptions } from "discord.js";
import { ERROR_COLOR, INFO_COLOR } from "../../lib/constants.js";
import type { ForumThread } from "./platform.js";
import type { GuildEscalationSettings } from "./types.js";

export interface AlertPayload {
  content: string;
  embeds: EmbedBuilder[];
  allowedMentions: MessageMentionOptions;
}

// Discord embed field values cap at 1024; titles are far shorter but links add up
const MAX_THREAD_NAME_LENGTH = 200;

function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function threadLink(thread: ForumThread): string {
  const name =
    thread.name.length > MAX_THREAD_NAME_LENGTH
      ? `${thread.name.slice(0, MAX_THREAD_NAME_LENGTH - 1)}…`
      : thread.name;
  // Brackets in the title would break the markdown link
  return `[${name.replace(/[[\]]/g, "")}](${thread.url})`;
}

function roleOnly(roleId: string): MessageMentionOptions {
  return { roles: [roleId], users: [], repliedUser: false };
}

export function buildTier1Alert(
  thread: ForumThread,
  settings: Pick<GuildEscalationSettings, "tier1RoleId" | "tier1ThresholdHours">,
  now: Date
): AlertPayload {
  const embed = new EmbedBuilder()
    .setTitle("Thread Needs Attention - Tier 1")
    .setDescription(
      `This thread has been waiting for a response for **${settings.tier1ThresholdHours} hours** ` +
        `without any support team replies.\n\nPlease review and assist if needed.`
    )
    .setColor(INFO_COLOR)
    .addFields(
      { name: "Thread", value: threadLink(thread), inline: false },
      { name: "Created", value: `<t:${toUnixSeconds(thread.createdAt)}>`, inline: true },
      { name: "Last Checked", value: `<t:${toUnixSeconds(now)}>`, inline: true }
    );

  return {
    content: `<@&${settings.tier1RoleId}>`,
    embeds: [embed],
    allowedMentions: roleOnly(settings.tier1RoleId),
  };
}

export function buildTier2Alert(
  thread: ForumThread,
  settings: Pick<GuildEscalationSettings, "tier2RoleId" | "tier2ThresholdHours">
): AlertPayload {
  const embed = new EmbedBuilder()
    .setTitle("Thread Escalation - Tier 2")
    .setDescription(
      `**Urgent:** Thread requires immediate attention!\n\n` +
        `This thread has been waiting for **${settings.tier2ThresholdHours} hours** without support team responses.`
    )
    .setColor(ERROR_COLOR)
    .addFields(
      { name: "Thread", value: threadLink(thread), inline: false },
      { name: "Forum", value: `<#${thread.parentId}>`, inline: true },
      { name: "Author", value: thread.ownerId ? `<@${thread.ownerId}>` : "Unknown", inline: true },
      { name: "Created", value: `<t:${toUnixSeconds(thread.createdAt)}>`, inline: true }
    );

  return {
    content: `<@&${settings.tier2RoleId}>`,
    embeds: [embed],
    allowedMentions: roleOnly(settings.tier2RoleId),
  };
}
