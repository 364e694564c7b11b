/**
 * Threadkeeper — src/config/guildConfigStore.ts
 * WHAT: Per-guild moderation config: monitored forums, support roles, DM notices.
 * WHY: The reply guard reads this on every message in a monitored forum and the
 *      sweep reads it once per guild per tick.
 * FLOWS:
 *  - getGuildConfig(guildId) → straight from SQLite (sweep)
 *  - getCachedGuildConfig(guildId) → TTL cache, then SQLite (messageCreate hot path)
 *  - add/remove monitored channel or support role → write → invalidate cache
 * DOCS:
 *  - better-sqlite3 prepared statements: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { logger } from "../lib/logger.js";
import { TtlCache } from "../lib/ttlCache.js";

export interface GuildConfig {
  guildId: string;
  monitoredChannelIds: string[];
  supportRoleIds: string[];
  dmNotificationsEnabled: boolean;
}

/** Read side the sweep and listeners depend on */
export interface GuildConfigReader {
  getGuildConfig(guildId: string): GuildConfig | null;
  getCachedGuildConfig(guildId: string): GuildConfig | null;
}

// Max guilds cached; a bot this size sits in far fewer
const CACHE_MAX_SIZE = 1000;

export class GuildConfigStore implements GuildConfigReader {
  private readonly cache: TtlCache<string, GuildConfig | null>;
  private readonly getSettingsStmt: Database.Statement<[string], { dm_notifications_enabled: number }>;
  private readonly listChannelsStmt: Database.Statement<[string], { channel_id: string }>;
  private readonly listRolesStmt: Database.Statement<[string], { role_id: string }>;
  private readonly ensureGuildStmt: Database.Statement<[string]>;
  private readonly addChannelStmt: Database.Statement<[string, string]>;
  private readonly removeChannelStmt: Database.Statement<[string, string]>;
  private readonly addRoleStmt: Database.Statement<[string, string]>;
  private readonly removeRoleStmt: Database.Statement<[string, string]>;
  private readonly setDmStmt: Database.Statement<[string, number]>;

  constructor(database: Database.Database, options: { cacheTtlMs: number; now?: () => number }) {
    this.cache = new TtlCache(CACHE_MAX_SIZE, options.cacheTtlMs, options.now);

    this.getSettingsStmt = database.prepare<[string], { dm_notifications_enabled: number }>(
      `SELECT dm_notifications_enabled FROM guild_settings WHERE guild_id = ?`
    );
    this.listChannelsStmt = database.prepare<[string], { channel_id: string }>(
      `SELECT channel_id FROM monitored_channels WHERE guild_id = ? ORDER BY channel_id`
    );
    this.listRolesStmt = database.prepare<[string], { role_id: string }>(
      `SELECT role_id FROM support_roles WHERE guild_id = ? ORDER BY role_id`
    );
    this.ensureGuildStmt = database.prepare<[string]>(
      `INSERT OR IGNORE INTO guild_settings (guild_id) VALUES (?)`
    );
    this.addChannelStmt = database.prepare<[string, string]>(
      `INSERT OR IGNORE INTO monitored_channels (guild_id, channel_id) VALUES (?, ?)`
    );
    this.removeChannelStmt = database.prepare<[string, string]>(
      `DELETE FROM monitored_channels WHERE guild_id = ? AND channel_id = ?`
    );
    this.addRoleStmt = database.prepare<[string, string]>(
      `INSERT OR IGNORE INTO support_roles (guild_id, role_id) VALUES (?, ?)`
    );
    this.removeRoleStmt = database.prepare<[string, string]>(
      `DELETE FROM support_roles WHERE guild_id = ? AND role_id = ?`
    );
    this.setDmStmt = database.prepare<[string, number]>(
      `INSERT INTO guild_settings (guild_id, dm_notifications_enabled) VALUES (?, ?)
       ON CONFLICT(guild_id) DO UPDATE SET dm_notifications_enabled = excluded.dm_notifications_enabled`
    );
  }

  /** null when the guild was never configured */
  getGuildConfig(guildId: string): GuildConfig | null {
    const settings = this.getSettingsStmt.get(guildId);
    if (!settings) return null;

    return {
      guildId,
      monitoredChannelIds: this.listChannelsStmt.all(guildId).map((r) => r.channel_id),
      supportRoleIds: this.listRolesStmt.all(guildId).map((r) => r.role_id),
      dmNotificationsEnabled: settings.dm_notifications_enabled === 1,
    };
  }

  getCachedGuildConfig(guildId: string): GuildConfig | null {
    const hit = this.cache.get(guildId);
    if (hit) return hit.value;

    const config = this.getGuildConfig(guildId);
    this.cache.set(guildId, config);
    return config;
  }

  ensureGuild(guildId: string): void {
    this.ensureGuildStmt.run(guildId);
    this.cache.invalidate(guildId);
  }

  /** false when the channel was already monitored */
  addMonitoredChannel(guildId: string, channelId: string): boolean {
    this.ensureGuildStmt.run(guildId);
    const added = this.addChannelStmt.run(guildId, channelId).changes > 0;
    this.cache.invalidate(guildId);
    logger.info({ guildId, channelId, added }, "[guildConfig] monitored channel add");
    return added;
  }

  /** false when the channel wasn't monitored */
  removeMonitoredChannel(guildId: string, channelId: string): boolean {
    const removed = this.removeChannelStmt.run(guildId, channelId).changes > 0;
    this.cache.invalidate(guildId);
    logger.info({ guildId, channelId, removed }, "[guildConfig] monitored channel remove");
    return removed;
  }

  addSupportRole(guildId: string, roleId: string): boolean {
    this.ensureGuildStmt.run(guildId);
    const added = this.addRoleStmt.run(guildId, roleId).changes > 0;
    this.cache.invalidate(guildId);
    logger.info({ guildId, roleId, added }, "[guildConfig] support role add");
    return added;
  }

  removeSupportRole(guildId: string, roleId: string): boolean {
    const removed = this.removeRoleStmt.run(guildId, roleId).changes > 0;
    this.cache.invalidate(guildId);
    logger.info({ guildId, roleId, removed }, "[guildConfig] support role remove");
    return removed;
  }

  setDmNotifications(guildId: string, enabled: boolean): void {
    this.setDmStmt.run(guildId, enabled ? 1 : 0);
    this.cache.invalidate(guildId);
  }

  /** Called when the bot leaves a guild */
  clearGuildCache(guildId: string): void {
    if (this.cache.invalidate(guildId)) {
      logger.info({ guildId }, "[guildConfig] cache cleared");
    }
  }

  /** Periodic housekeeping so departed guilds don't linger until eviction */
  sweepExpiredCache(): number {
    return this.cache.sweepExpired();
  }
}
