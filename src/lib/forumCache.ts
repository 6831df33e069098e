/**
 * Forum Upvote — src/lib/forumCache.ts
 * WHAT: In-memory channel id → "is a forum" classification.
 *
 * IMPLEMENTATION NOTES:
 *  - Entries never expire: a channel's type does not change in practice, so a
 *    stored answer stays authoritative for the life of the process
 *  - The first answer for a key wins; later remember() calls are ignored
 *  - Each entry is a single Map.set of the whole pair, and Node runs one
 *    callback at a time, so readers never see a half-written entry
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export class ForumCache {
  private readonly entries = new Map<string, boolean>();

  /**
   * @param seed - Initial `[channelId, isForum]` pairs
   */
  constructor(seed: Iterable<readonly [string, boolean]> = []) {
    for (const [channelId, isForum] of seed) {
      this.remember(channelId, isForum);
    }
  }

  /**
   * Cached classification, or undefined when the channel was never learned.
   */
  get(channelId: string): boolean | undefined {
    return this.entries.get(channelId);
  }

  has(channelId: string): boolean {
    return this.entries.has(channelId);
  }

  /**
   * Store a classification. Returns false if the key was already present.
   */
  remember(channelId: string, isForum: boolean): boolean {
    if (this.entries.has(channelId)) return false;
    this.entries.set(channelId, isForum);
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Build a cache seeded with channels known to be forums.
 */
export function createForumCache(forumChannelIds: readonly string[] = []): ForumCache {
  return new ForumCache(forumChannelIds.map((id) => [id, true] as const));
}
