/**
 * Threadkeeper — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for Discord.js event handlers
 * WHY: Ensures events never crash the bot, always logged with error classification
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches errors
 *  - Error classification applied to all caught errors
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  import { wrapEvent } from "./eventWrap.js";
 *  client.on("messageCreate", wrapEvent("messageCreate", async (message) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * Default timeout for event handlers. A messageCreate handler only touches
 * SQLite and at most two REST calls; anything slower than this needs a look.
 */
const DEFAULT_EVENT_TIMEOUT_MS = parseInt(process.env.EVENT_TIMEOUT_MS ?? "10000", 10);

/**
 * Wrap an event handler with error protection.
 *
 * @example
 * client.on("threadDelete", wrapEvent("threadDelete", (thread) => {
 *   escalationStore.resetState(thread.id);
 * }));
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  // The returned wrapper never rejects: an unhandled rejection in a listener
  // can take the whole process down.
  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        handler(...args),
        new Promise<void>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)),
            timeoutMs
          );
        }),
      ]);
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
        },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err instanceof Error ? err : new Error(String(err)), {
          event: eventName,
          errorKind: classified.kind,
          ...contextIds,
        });
      }
    } finally {
      clearTimeout(timer);
    }
  };
}

/**
 * Pull guild/channel/author ids off common discord.js payloads (Message,
 * ThreadChannel, Guild) so error logs can be traced to a server.
 */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    if ("guildId" in arg && typeof arg.guildId === "string") {
      context.guildId = arg.guildId;
    }
    if ("channelId" in arg && typeof arg.channelId === "string") {
      context.channelId = arg.channelId;
    }
    if ("id" in arg && typeof arg.id === "string" && !context.entityId) {
      context.entityId = arg.id;
    }
    if ("author" in arg && arg.author && typeof arg.author === "object") {
      const author = arg.author;
      if ("id" in author && typeof author.id === "string") {
        context.userId = author.id;
      }
    }
  }

  return context;
}
