/**
 * Forum Upvote — src/events/threadCreate.ts
 * WHAT: Upvotes the opening message of every new forum post.
 * FLOWS:
 *  - threadCreate → require parent id → is parent a forum? (cache, else REST)
 *  - forum → add ⬆️ to the thread's opening message (same id as the thread)
 *  - not a forum → debug log, nothing else
 * DOCS:
 *  - Forum channels: https://discord.com/developers/docs/topics/threads#forums
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType } from "discord.js";
import type { AppState } from "../lib/appState.js";
import { UPVOTE_REACTION } from "../lib/constants.js";
import { MissingParentError, toRemoteApiError } from "../lib/errors.js";
import { logger, redact } from "../lib/logger.js";
import type { ThreadCreatedEvent } from "../gateway/types.js";

export type ThreadOutcome = "reacted" | "not_forum";

/**
 * Whether a channel is a forum. Cached answers are returned without I/O.
 *
 * A miss asks Discord every time: the answer is not written back to the
 * cache, which only holds seeded entries.
 *
 * @throws RemoteApiError when the channel fetch fails or returns an unexpected body
 */
export async function isForumChannel(state: AppState, channelId: string): Promise<boolean> {
  const cached = state.forums.get(channelId);
  if (cached !== undefined) {
    return cached;
  }

  try {
    const channel = await state.api.fetchChannel(channelId);
    return channel.type === ChannelType.GuildForum;
  } catch (err) {
    throw toRemoteApiError("fetchChannel", channelId, err);
  }
}

/**
 * Handle one thread creation.
 *
 * @throws MissingParentError before any lookup when the thread has no parent id
 * @throws RemoteApiError when classification or the reaction call fails
 */
export async function handleThreadCreate(
  state: AppState,
  thread: ThreadCreatedEvent
): Promise<ThreadOutcome> {
  const parentId = thread.parentId;
  if (!parentId) {
    throw new MissingParentError(thread.id);
  }

  if (!(await isForumChannel(state, parentId))) {
    logger.debug(
      { parentId, threadId: thread.id },
      "[threadCreate] Skipping thread because parent was not a forum"
    );
    return "not_forum";
  }

  // A thread's opening message shares the thread's id
  try {
    await state.api.addReaction(thread.id, thread.id, UPVOTE_REACTION);
  } catch (err) {
    throw toRemoteApiError("addReaction", thread.id, err);
  }

  logger.info(
    {
      guildId: thread.guildId,
      parentId,
      threadId: thread.id,
      threadName: redact(thread.name),
    },
    "[threadCreate] upvoted new forum post"
  );
  return "reacted";
}
