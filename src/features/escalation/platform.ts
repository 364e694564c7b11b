/**
 * Threadkeeper — src/features/escalation/platform.ts
 * WHAT: The slice of Discord the escalation sweep needs, behind an interface.
 * WHY: The sweep is tested against an in-process fake; only this file talks to discord.js.
 * FLOWS:
 *  - listGuildIds() → guilds the client is in
 *  - listActiveThreads(guildId) → active forum/media threads of the guild, one REST call
 *  - fetchHistory(guildId, threadId) → lazy newest-first message stream
 *  - sendAlert({ guildId, channelId, roleId }, payload)
 * DOCS:
 *  - GuildChannelManager.fetchActiveThreads: https://discord.js.org/docs/packages/discord.js/main/GuildChannelManager:Class
 *  - MessageManager.fetch: https://discord.js.org/docs/packages/discord.js/main/MessageManager:Class
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ChannelType,
  SnowflakeUtil,
  type AnyThreadChannel,
  type Client,
  type Guild,
  type Message,
} from "discord.js";
import { HISTORY_PAGE_SIZE } from "../../lib/constants.js";
import { classifyError, MissingTargetError } from "../../lib/errors.js";
import type { AlertPayload } from "./alerts.js";
import type { HistoryMessage } from "./types.js";

export interface ForumThread {
  id: string;
  guildId: string;
  parentId: string;
  ownerId: string | null;
  name: string;
  url: string;
  createdAt: Date;
  archived: boolean;
  locked: boolean;
}

export interface AlertTarget {
  guildId: string;
  channelId: string;
  roleId: string;
}

export interface EscalationPlatform {
  listGuildIds(): string[];
  /** Threads whose parent is not a forum or media channel are left out */
  listActiveThreads(guildId: string): Promise<ForumThread[]>;
  fetchHistory(guildId: string, threadId: string): AsyncIterable<HistoryMessage>;
  sendAlert(target: AlertTarget, payload: AlertPayload): Promise<void>;
}

// Unknown Member: the author left the guild
const UNKNOWN_MEMBER_CODE = 10007;

export function toForumThread(thread: AnyThreadChannel, parentId: string): ForumThread {
  return {
    id: thread.id,
    guildId: thread.guildId,
    parentId,
    ownerId: thread.ownerId,
    name: thread.name,
    url: thread.url,
    createdAt: thread.createdAt ?? new Date(SnowflakeUtil.timestampFrom(thread.id)),
    archived: thread.archived ?? false,
    locked: thread.locked ?? false,
  };
}

export class DiscordEscalationPlatform implements EscalationPlatform {
  constructor(private readonly client: Client) {}

  listGuildIds(): string[] {
    return [...this.client.guilds.cache.keys()];
  }

  private getGuild(guildId: string): Guild {
    const guild = this.client.guilds.cache.get(guildId);
    if (!guild) throw new MissingTargetError("guild", guildId);
    return guild;
  }

  async listActiveThreads(guildId: string): Promise<ForumThread[]> {
    const guild = this.getGuild(guildId);
    const { threads } = await guild.channels.fetchActiveThreads();

    const result: ForumThread[] = [];
    for (const thread of threads.values()) {
      if (!thread.parentId) continue;
      // Parent missing from cache: keep it, the sweep only looks at monitored ids
      const parentType = thread.parent?.type;
      if (parentType !== undefined && parentType !== ChannelType.GuildForum && parentType !== ChannelType.GuildMedia) {
        continue;
      }
      result.push(toForumThread(thread, thread.parentId));
    }
    return result;
  }

  /**
   * REST-fetched messages carry no member, so author roles are resolved per
   * author once per stream. Authors who left the guild have no roles.
   */
  async *fetchHistory(guildId: string, threadId: string): AsyncGenerator<HistoryMessage> {
    const guild = this.getGuild(guildId);
    const channel = await this.client.channels.fetch(threadId);
    if (!channel || !channel.isThread()) throw new MissingTargetError("thread", threadId);

    const roleCache = new Map<string, string[]>();
    const rolesFor = async (message: Message): Promise<string[]> => {
      if (message.author.bot) return [];
      if (message.member) return [...message.member.roles.cache.keys()];

      const cached = roleCache.get(message.author.id);
      if (cached) return cached;

      let roles: string[] = [];
      try {
        const member = await guild.members.fetch(message.author.id);
        roles = [...member.roles.cache.keys()];
      } catch (err) {
        const classified = classifyError(err);
        if (classified.kind !== "discord_api" || classified.code !== UNKNOWN_MEMBER_CODE) throw err;
      }
      roleCache.set(message.author.id, roles);
      return roles;
    };

    let before: string | undefined;
    for (;;) {
      const page = await channel.messages.fetch({ limit: HISTORY_PAGE_SIZE, before });
      for (const message of page.values()) {
        yield {
          authorId: message.author.id,
          authorRoleIds: await rolesFor(message),
          authorIsBot: message.author.bot,
          createdAt: message.createdAt,
        };
      }
      if (page.size < HISTORY_PAGE_SIZE) return;
      before = page.lastKey();
    }
  }

  async sendAlert(target: AlertTarget, payload: AlertPayload): Promise<void> {
    const guild = this.getGuild(target.guildId);

    const role = await guild.roles.fetch(target.roleId);
    if (!role) throw new MissingTargetError("role", target.roleId);

    const channel = await this.client.channels.fetch(target.channelId);
    if (!channel || !channel.isSendable()) throw new MissingTargetError("channel", target.channelId);

    await channel.send(payload);
  }
}
