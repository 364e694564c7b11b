/**
 * Threadkeeper — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, wires listeners, starts the escalation scheduler.
 * WHY: Startup order and shutdown order live in one place.
 * FLOWS:
 *  - Boot: Sentry → env → SQLite (schema ensured) → stores → client listeners → login
 *  - Ready: start escalation scheduler + config cache housekeeping
 *  - messageCreate: reply guard → escalation listener (only if the message survived)
 *  - threadUpdate (archived) / threadDelete → reset escalation state
 *  - guildDelete → drop cached config
 *  - SIGTERM/SIGINT → stop scheduler → remove listeners → destroy client → close DB → flush Sentry
 * DOCS:
 *  - discord.js v14 events: https://discord.js.org/docs/packages/discord.js/main/Client:Class
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { addBreadcrumb, flushSentry, initializeSentry, setTag } from "./lib/sentry.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
initializeSentry();

import { Client, Events, GatewayIntentBits } from "discord.js";
import { logger } from "./lib/logger.js";

// ===== Global Error Handlers =====
// The logger forwards error-level entries carrying `err` to Sentry.
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  // Don't exit - discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

import { env } from "./lib/env.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { requireEnv } from "./util/ensureEnv.js";
import { closeDatabase, db } from "./db/db.js";
import { GuildConfigStore } from "./config/guildConfigStore.js";
import { SqliteEscalationStore } from "./store/escalationStore.js";
import { DiscordEscalationPlatform } from "./features/escalation/platform.js";
import {
  startEscalationScheduler,
  stopEscalationScheduler,
} from "./scheduler/escalationScheduler.js";
import { enforceReplyGuard } from "./events/replyGuard.js";
import {
  handleEscalationReply,
  handleThreadArchived,
  handleThreadDeleted,
  threadReplyFromMessage,
} from "./events/escalationReplyReset.js";

// How often expired guild config entries are dropped from memory
const CONFIG_CACHE_SWEEP_MS = 10 * 60 * 1000;

async function main(): Promise<void> {
  const DISCORD_TOKEN = requireEnv("DISCORD_TOKEN");

  const configs = new GuildConfigStore(db, { cacheTtlMs: env.CONFIG_CACHE_TTL_SECONDS * 1000 });
  const store = new SqliteEscalationStore(db);

  // GuildMembers: support-role checks need member roles on fetched history.
  // MessageContent is not requested; nothing here reads message text.
  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.GuildMembers],
  });
  const platform = new DiscordEscalationPlatform(client);

  let cacheSweepInterval: NodeJS.Timeout | null = null;

  client.once(Events.ClientReady, (readyClient) => {
    logger.info(
      { tag: readyClient.user.tag, id: readyClient.user.id, guilds: readyClient.guilds.cache.size },
      "Bot ready"
    );
    setTag("bot_id", readyClient.user.id);
    addBreadcrumb({ message: "Bot successfully connected to Discord", category: "bot", level: "info" });

    startEscalationScheduler(
      { platform, store, configs },
      { intervalMs: env.ESCALATION_INTERVAL_MINUTES * 60 * 1000 }
    );

    cacheSweepInterval = setInterval(() => {
      const removed = configs.sweepExpiredCache();
      if (removed > 0) logger.debug({ removed }, "[guildConfig] expired cache entries dropped");
    }, CONFIG_CACHE_SWEEP_MS);
    cacheSweepInterval.unref();
  });

  client.on(
    Events.MessageCreate,
    wrapEvent("messageCreate", async (message) => {
      if (message.author.bot || !message.inGuild()) return;

      const outcome = await enforceReplyGuard(message, { configs, store });
      if (outcome === "removed") return;

      const reply = threadReplyFromMessage(message);
      if (reply) handleEscalationReply(reply, { configs, store });
    })
  );

  client.on(
    Events.ThreadUpdate,
    wrapEvent("threadUpdate", (oldThread, newThread) => {
      handleThreadArchived(oldThread, newThread, store);
    })
  );

  client.on(
    Events.ThreadDelete,
    wrapEvent("threadDelete", (thread) => {
      handleThreadDeleted(thread, store);
    })
  );

  client.on(
    Events.GuildDelete,
    wrapEvent("guildDelete", (guild) => {
      configs.clearGuildCache(guild.id);
      logger.info({ guildId: guild.id }, "[guildDelete] left guild, cache cleared");
    })
  );

  // ===== Coordinated Graceful Shutdown =====
  // ORDER: 1) Stop scheduler, 2) Remove listeners, 3) Destroy client, 4) Close DB, 5) Flush Sentry
  let isShuttingDown = false;

  const gracefulShutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

    try {
      stopEscalationScheduler();
      if (cacheSweepInterval) clearInterval(cacheSweepInterval);

      client.removeAllListeners();
      logger.debug("[shutdown] Event listeners removed");

      await client.destroy();
      logger.debug("[shutdown] Discord client destroyed");

      closeDatabase();
      await flushSentry();

      logger.info("[shutdown] Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "[shutdown] Error during graceful shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  await client.login(DISCORD_TOKEN);
}

// Only start the bot if not running in test environment
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
