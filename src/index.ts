/**
 * Smyklot - src/index.ts
 * WHAT: Main process entrypoint. Builds shared state, wires gateway events, logs in.
 * WHY: One place to see startup order and what every handler gets handed.
 * FLOWS:
 *  - Startup: env (validated on import) → Sentry → config/owners/buckets/registry → client → login
 *  - Ready: identity log → presence → application owners
 *  - Message: trigger phrases → dispatcher
 *  - Shutdown: stop sweeper → remove listeners → destroy client → flush Sentry
 * DOCS:
 *  - discord.js v14 Client: https://discord.js.org/#/docs/discord.js/main/class/Client
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { flushSentry, initializeSentry } from "./lib/sentry.js";
initializeSentry();

import { Client, Events, GatewayIntentBits, Partials, type Message } from "discord.js";
import { env } from "./lib/env.js";
import { logger } from "./lib/logger.js";

/** Time for Sentry to send the crash report before the process goes down */
const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 2000;

// ===== Global Error Handlers =====

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  // discord.js recovers from most rejections; keep running
});

process.on("uncaughtException", (error, origin) => {
  // error-level logs carrying an Error go to Sentry through the logger hook
  logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception - exiting");
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

import { buildBuckets, buildRegistry } from "./commands/buildCommands.js";
import { Dispatcher } from "./commands/dispatcher.js";
import { ConfigStore, configFromEnv } from "./lib/configStore.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { OwnerSet } from "./lib/owner.js";
import * as messageRouter from "./listeners/messageRouter.js";
import * as ready from "./listeners/ready.js";
import { createDiscordPlatform } from "./platform/discord.js";

async function main(): Promise<void> {
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.DirectMessages,
      GatewayIntentBits.MessageContent,
      // mute lookups by name and "muted" need the full member list
      GatewayIntentBits.GuildMembers,
    ],
    // DM channels arrive uncached
    partials: [Partials.Channel],
  });

  const platform = createDiscordPlatform(client);
  const config = new ConfigStore(configFromEnv(env));
  const owners = new OwnerSet(env.OWNER_IDS);
  const buckets = buildBuckets();
  const stopSweeper = buckets.startSweeper();
  const registry = buildRegistry();

  const dispatcher = new Dispatcher({
    registry,
    buckets,
    config,
    platform,
    owners,
    settings: {
      prefixes: env.COMMAND_PREFIXES,
      delimiters: env.COMMAND_DELIMITERS,
      allowWhitespace: env.PREFIX_WHITESPACE,
      maxSuggestionDistance: env.MAX_SUGGESTION_DISTANCE,
      ignoreBots: true,
    },
  });

  client.once(
    ready.name,
    wrapEvent("ready", (c: Client<true>) =>
      ready.execute(c, { owners, platform, presenceText: env.PRESENCE_TEXT })
    )
  );
  client.on(
    messageRouter.name,
    wrapEvent("messageCreate", (message: Message) => messageRouter.execute(message, { dispatcher, platform }))
  );
  client.on(Events.Error, (err) => {
    logger.error({ evt: "client_error", err }, "[client] gateway error");
  });

  // ===== Graceful Shutdown =====
  let isShuttingDown = false;
  const gracefulShutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

    try {
      stopSweeper();
      client.removeAllListeners();
      await client.destroy();
      logger.debug("[shutdown] Discord client destroyed");
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

  logger.info(
    { groups: registry.groups.length, commands: registry.commands().length, owners: owners.size },
    "[startup] command registry built"
  );
  await client.login(env.DISCORD_TOKEN);
}

// Importing this module under Vitest must not open a gateway connection
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
