/**
 * Forum Upvote — src/lib/appState.ts
 * WHAT: Process-wide state shared by the event loop and thread handler.
 *
 * Built once at startup and frozen. Nothing tears it down; it lives until exit.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { RemoteApiClient } from "./discordApi.js";
import { ForumCache } from "./forumCache.js";

export interface AppState {
  readonly api: RemoteApiClient;
  readonly forums: ForumCache;
}

export function createAppState(api: RemoteApiClient, forums: ForumCache = new ForumCache()): AppState {
  return Object.freeze({ api, forums });
}
