/**
 * Forum Upvote — src/config.ts
 * WHAT: Process-wide settings read straight from environment variables.
 *
 * ENV VARS:
 *  - TRACE_EVENTS: Set to "1" to log every gateway event at trace level
 *  - FORUM_CHANNEL_IDS: Comma-separated channel IDs seeded into the forum cache
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ============================================================================
// Debugging & Diagnostics
// ============================================================================

/**
 * Logs each received gateway event (and transport error) before it is handled.
 * Only visible with LOG_LEVEL=trace.
 */
export const TRACE_EVENTS = process.env.TRACE_EVENTS === "1";

// ============================================================================
// Forum Classification
// ============================================================================

/**
 * Parse a comma-separated ID list. Whitespace around IDs is trimmed and empty
 * strings are filtered out, so "123, 456, " parses to ["123", "456"].
 */
export function parseIdList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

/**
 * Channels known to be forums at startup. Seeded into the classification
 * cache as `true`; lookups for them never reach the REST API.
 */
export const FORUM_CHANNEL_IDS = parseIdList(process.env.FORUM_CHANNEL_IDS);
