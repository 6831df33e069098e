/**
 * Forum Upvote — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture and shutdown flush.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import {
  consoleIntegration,
  onUncaughtExceptionIntegration,
  onUnhandledRejectionIntegration,
} from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { env } from "./env.js";
import { logger } from "./logger.js";

let sentryEnabled = false;

const TOKEN_RE = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;

/**
 * Structural DSN check: https://{key}@{host}/{project}. Invalid keys are caught
 * at runtime by the 403 handler below.
 */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

// Version from package.json for release tracking
function getVersion(): string {
  try {
    const packagePath = path.join(process.cwd(), "package.json");
    const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    if (packageJson && typeof packageJson === "object" && "version" in packageJson) {
      return String(packageJson.version);
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates if SENTRY_DSN is valid and not running under Vitest.
 */
export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) {
    return;
  }

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
      release: `forum-upvote-bot@${getVersion()}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,

      integrations: [
        consoleIntegration({
          levels: ["error", "warn"],
        }),
        // The process-level handlers in index.ts own exit timing
        onUncaughtExceptionIntegration({
          exitEvenIfOtherHandlersAreRegistered: false,
        }),
        onUnhandledRejectionIntegration({
          mode: "warn",
        }),
      ],

      beforeSend(event) {
        if (event.message) {
          event.message = event.message.replace(TOKEN_RE, "[REDACTED_TOKEN]");
        }
        const runtimeEnv = event.contexts?.runtime?.env;
        if (runtimeEnv && typeof runtimeEnv === "object") {
          const scrubbed: Record<string, unknown> = { ...runtimeEnv };
          if ("DISCORD_TOKEN" in scrubbed) scrubbed.DISCORD_TOKEN = "[REDACTED]";
          if ("SENTRY_DSN" in scrubbed) scrubbed.SENTRY_DSN = "[REDACTED]";
          event.contexts = {
            ...event.contexts,
            runtime: { ...event.contexts?.runtime, env: scrubbed },
          };
        }
        return event;
      },

      // Transient network noise; logged locally with more context
      ignoreErrors: ["AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],

      debug: env.NODE_ENV === "development",
    });

    sentryEnabled = true;
    logger.info({ environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV }, "Sentry initialized");

    // Stale or revoked DSN: stop sending once Sentry answers 403.
    const client = Sentry.getClient();
    client?.on("afterSendEvent", (_event, response) => {
      if (response.statusCode === 403) {
        logger.warn({ statusCode: response.statusCode }, "Sentry unauthorized (403); disabling capture");
        sentryEnabled = false;
      }
    });
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Capture an exception in Sentry. Returns the event id, or null when disabled.
 */
export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

/**
 * Flush any pending events (use before shutdown)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.warn({ err }, "Failed to flush Sentry events");
    return false;
  }
}
