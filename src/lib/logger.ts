/**
 * Forum Upvote — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Redaction patterns for common secrets that might leak into logs.
 *
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * DSN pattern: Sentry DSNs embed auth tokens in URLs. Host kept, secret redacted.
 * Mention pattern: @everyone/@here coming from thread names or other user content.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

// Only warn once per process if the Sentry module fails to load
let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled or external data.
 * Truncates at 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

/**
 * Keeps only the useful fields of an error. discord.js errors carry request
 * bodies and circular references that bloat JSON lines.
 */
export function serializeError(e: unknown): Record<string, unknown> {
  if (!e || typeof e !== "object") {
    return { message: String(e) };
  }
  const field = (key: string): unknown => Reflect.get(e, key);
  const cause = field("cause");
  return {
    name: field("name"),
    code: field("code"),
    message: field("message"),
    stack: field("stack"),
    ...(cause instanceof Error ? { cause: { name: cause.name, message: cause.message } } : {}),
  };
}

/**
 * True for a log object carrying `sentry: false`.
 */
export function skipsSentry(obj: unknown): boolean {
  return typeof obj === "object" && obj !== null && "sentry" in obj && obj.sentry === false;
}

/**
 * Log level defaults to "info" but can be overridden via LOG_LEVEL env var.
 * Set to "trace" together with TRACE_EVENTS=1 to see every gateway event.
 *
 * Pretty printing enabled for: test runs (always) and TTY dev environments
 * (when LOG_PRETTY=true). Production writes newline-delimited JSON.
 */
const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : {}),
  base: undefined, // Omit pid/hostname from JSON output too
  serializers: {
    err: serializeError,
  },
  /**
   * Intercepts error-level logs and forwards the attached Error to Sentry, so
   * logger.error({ err }, ...) is enough to get an error reported. Callers that
   * already decided on capture themselves pass `sentry: false`.
   */
  hooks: {
    logMethod(args, method, level) {
      const firstArg: unknown = args[0];
      if (level >= pino.levels.values.error && !skipsSentry(firstArg)) {
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object" && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import to avoid the sentry ↔ logger import cycle at load time.
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn(
                  "[logger] Failed to import Sentry module:",
                  importErr instanceof Error ? importErr.message : importErr
                );
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
