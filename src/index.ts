/**
 * Forum Upvote — src/index.ts
 * WHAT: Main process entrypoint. Connects to the gateway and runs the event loop.
 * FLOWS:
 *  - Startup: Sentry → env (exit 1 without DISCORD_TOKEN) → app state → login
 *  - Run: event loop until SIGTERM/SIGINT or a fatal gateway error
 *  - Exit: release shutdown handler → flush Sentry → exit 0 (signal) / 1 (fatal)
 * DOCS:
 *  - discord.js v14: https://discord.js.org/docs/packages/discord.js/main
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Node process signals: https://nodejs.org/api/process.html#signal-events
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, captureException, flushSentry } from "./lib/sentry.js";
import { SENTRY_FLUSH_TIMEOUT_MS, UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
initializeSentry();

import { Client, GatewayIntentBits, Options } from "discord.js";
import { logger } from "./lib/logger.js";
import { env } from "./lib/env.js";
import { FORUM_CHANNEL_IDS, TRACE_EVENTS } from "./config.js";
import { createAppState } from "./lib/appState.js";
import { createDiscordApiClient } from "./lib/discordApi.js";
import { createForumCache } from "./lib/forumCache.js";
import { installShutdownHandler } from "./lib/shutdown.js";
import { DiscordGatewaySource, loginUntilAborted } from "./gateway/discordSource.js";
import { EventLoop } from "./gateway/eventLoop.js";

// ===== Global Error Handlers =====

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  captureException(error, { context: "uncaughtException", origin });
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

/**
 * Only the Guilds intent: THREAD_CREATE is delivered under it and nothing
 * else is needed. Caches the bot never reads are disabled.
 */
function createClient(): Client {
  return new Client({
    intents: [GatewayIntentBits.Guilds],
    makeCache: Options.cacheWithLimits({
      ...Options.DefaultMakeCacheSettings,
      MessageManager: 0,
      PresenceManager: 0,
      ReactionManager: 0,
      ThreadMemberManager: 0,
    }),
  });
}

async function main(): Promise<number> {
  const shutdown = installShutdownHandler();

  const client = createClient();
  const source = new DiscordGatewaySource(client);
  const forums = createForumCache(FORUM_CHANNEL_IDS);
  const app = createAppState(createDiscordApiClient(client.rest), forums);
  logger.info({ seededForums: forums.size }, "[startup] app state ready");

  if (await loginUntilAborted(client, env.DISCORD_TOKEN, shutdown.signal)) {
    logger.info("[startup] logged in, waiting for events");
  } else {
    // The loop sees the aborted signal on entry and closes the source
    logger.info("[startup] shutdown requested before login finished");
  }

  const loop = new EventLoop(app, source, shutdown.signal, { traceEvents: TRACE_EVENTS });
  const exit = await loop.run();
  shutdown.release();

  await flushSentry(SENTRY_FLUSH_TIMEOUT_MS);
  return exit.reason === "cancelled" ? 0 : 1;
}

main().then(
  (code) => process.exit(code),
  async (err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    await flushSentry(SENTRY_FLUSH_TIMEOUT_MS);
    process.exit(1);
  }
);
