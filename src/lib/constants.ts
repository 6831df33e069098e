/**
 * Forum Upvote — src/lib/constants.ts
 * WHAT: Centralized constants for reactions, timeouts, and exit delays.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Reactions =====

/**
 * Reaction added to the opening message of every new forum post.
 * Unicode emoji, sent URI-encoded in the reaction route.
 */
export const UPVOTE_REACTION = "⬆️";

// ===== Timeouts & Delays =====

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** Upper bound on how long shutdown waits for Sentry to drain its queue */
export const SENTRY_FLUSH_TIMEOUT_MS = 2000;

// ===== Gateway =====

/** Reason passed to the gateway source when the loop closes it after a signal */
export const CLOSE_REASON_SHUTDOWN = "shutdown requested";

/** Reason passed to the gateway source when the loop closes it after a fatal error */
export const CLOSE_REASON_FATAL = "fatal transport error";
