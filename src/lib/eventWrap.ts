/**
 * Smyklot - src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers
 * WHY: Events never crash the bot and every failure is logged with error classification
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches errors
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  client.on(Events.MessageCreate, wrapEvent("messageCreate", async (message) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * Events should complete quickly. 10 seconds catches genuinely stuck handlers
 * (a hung REST call) without tripping on a slow reply.
 */
const DEFAULT_EVENT_TIMEOUT_MS = parseInt(process.env.EVENT_TIMEOUT_MS ?? "10000", 10);

/**
 * Wrap an event handler with error protection.
 *
 * @example
 * client.once(Events.ClientReady, wrapEvent("ready", async (c) => onReady(c)));
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
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
          timer.unref();
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

      // Never re-throw: one failing handler must not take the process down.
    } finally {
      if (timer) clearTimeout(timer);
    }
  };
}

function field(source: unknown, key: string): unknown {
  if (!source || typeof source !== "object") return undefined;
  return key in source ? Reflect.get(source, key) : undefined;
}

function readId(source: unknown): string | undefined {
  const id = field(source, "id");
  return typeof id === "string" ? id : undefined;
}

/**
 * Extract common identifiers from discord.js event arguments.
 *
 * Payloads differ per event (Message, GuildMember, Client), so this probes for
 * guild/author/channel properties and ignores anything it doesn't recognize.
 */
export function extractEventContext(args: unknown[]): Record<string, unknown> {
  const context: Record<string, unknown> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const directGuildId = field(arg, "guildId");
    if (typeof directGuildId === "string") {
      context.guildId = directGuildId;
    }
    const guildId = readId(field(arg, "guild"));
    if (guildId) context.guildId = guildId;

    const entityId = readId(arg);
    if (entityId && !context.entityId) context.entityId = entityId;

    const userId = readId(field(arg, "author")) ?? readId(field(arg, "user"));
    if (userId) context.userId = userId;

    const channelId = field(arg, "channelId");
    if (typeof channelId === "string") {
      context.channelId = channelId;
    }
  }

  return context;
}
