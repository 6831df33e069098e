/**
 * Forum Upvote — src/lib/discordApi.ts
 * WHAT: The two Discord REST calls the bot makes, behind a small interface.
 * FLOWS:
 *  - fetchChannel(id) → GET /channels/{id} → zod-validated ChannelMetadata
 *  - addReaction(channel, message, emoji) → PUT .../reactions/{emoji}/@me
 * DOCS:
 *  - Get Channel: https://discord.com/developers/docs/resources/channel#get-channel
 *  - Create Reaction: https://discord.com/developers/docs/resources/message#create-reaction
 *  - @discordjs/rest: https://discord.js.org/docs/packages/rest/main
 *
 * Errors are thrown as-is (DiscordAPIError, HTTPError, ZodError, network errors);
 * the thread handler wraps them into RemoteApiError.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Routes, type REST } from "discord.js";
import { z } from "zod";

/**
 * Subset of the channel payload the bot reads. Unknown fields are stripped.
 */
export const channelMetadataSchema = z.object({
  id: z.string(),
  type: z.number().int(),
  name: z.string().nullish(),
  parent_id: z.string().nullish(),
});

/** `type` is a discord.js ChannelType value */
export type ChannelMetadata = z.infer<typeof channelMetadataSchema>;

export interface RemoteApiClient {
  fetchChannel(channelId: string): Promise<ChannelMetadata>;
  addReaction(channelId: string, messageId: string, emoji: string): Promise<void>;
}

/** The part of the discord.js REST client used here */
export type RestLike = Pick<REST, "get" | "put">;

/**
 * REST-backed client. Pass `client.rest` so requests share the gateway
 * client's rate-limit buckets.
 */
export function createDiscordApiClient(rest: RestLike): RemoteApiClient {
  return {
    async fetchChannel(channelId) {
      const body = await rest.get(Routes.channel(channelId));
      return channelMetadataSchema.parse(body);
    },

    async addReaction(channelId, messageId, emoji) {
      await rest.put(
        Routes.channelMessageOwnReaction(channelId, messageId, encodeURIComponent(emoji))
      );
    },
  };
}
