/**
 * Forum Upvote — src/gateway/types.ts
 * WHAT: Decoded gateway events and the pull-based source contract the loop consumes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * A thread that just appeared on the gateway. `parentId` is the channel the
 * thread lives under; Discord should always send it.
 */
export interface ThreadCreatedEvent {
  id: string;
  parentId: string | null;
  guildId: string | null;
  name: string;
  /** false when the bot was merely added to an existing private thread */
  newlyCreated: boolean;
}

export type GatewayEvent =
  | { kind: "threadCreate"; thread: ThreadCreatedEvent }
  | { kind: "ready"; tag: string };

/**
 * Sequential stream of gateway events.
 *
 * nextEvent() resolves with the next event in delivery order, or rejects with
 * a GatewayTransportError whose `fatal` flag says whether the connection is
 * gone for good. close() is best-effort.
 */
export interface GatewayEventSource {
  nextEvent(): Promise<GatewayEvent>;
  close(reason: string): Promise<void>;
}
