/**
 * Forum Upvote — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for gateway event handlers
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that never rejects
 *  - Error classification applied to all caught errors
 *  - Sentry capture only for reportable errors, exactly once
 * USAGE:
 *  const onThread = wrapEvent("threadCreate", (thread) => handleThreadCreate(state, thread));
 *  const ok = await onThread(event.thread);
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => unknown;

/**
 * Wrap an event handler with error protection.
 *
 * The wrapper resolves `true` when the handler finished and `false` when it
 * threw. Failures produce exactly one error log line. No timeout is applied;
 * a slow REST call holds the loop until discord.js gives up on it.
 *
 * @param eventName - Name of the event for logging
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>
): (...args: T) => Promise<boolean> {
  return async (...args: T) => {
    try {
      await handler(...args);
      return true;
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
          // Capture is decided below, not by the logger hook
          sentry: false,
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

      // Never re-throw: one bad event must not stop the loop.
      return false;
    }
  };
}

/**
 * Pull common identifiers out of event payloads for log context.
 * Unknown shapes are skipped.
 */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    if ("guildId" in arg && typeof arg.guildId === "string") {
      context.guildId = arg.guildId;
    }
    if ("parentId" in arg && typeof arg.parentId === "string") {
      context.parentId = arg.parentId;
    }
    if ("channelId" in arg && typeof arg.channelId === "string") {
      context.channelId = arg.channelId;
    }
    if ("id" in arg && typeof arg.id === "string" && !context.entityId) {
      context.entityId = arg.id;
    }
  }

  return context;
}
