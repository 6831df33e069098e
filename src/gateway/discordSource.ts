/**
 * Forum Upvote — src/gateway/discordSource.ts
 * WHAT: Adapts the discord.js Client's pushed events into a pull-based GatewayEventSource.
 * FLOWS:
 *  - threadCreate / clientReady → queued as events
 *  - error / shardError → queued as recoverable transport errors (discord.js reconnects)
 *  - invalidated / shardDisconnect → queued as fatal transport errors (no reconnect follows)
 *  - close(reason) → queue closed → client.destroy()
 *  - loginUntilAborted → client.login() raced against the shutdown signal
 * DOCS:
 *  - Client events: https://discord.js.org/docs/packages/discord.js/main/Client:Class
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Events, type AnyThreadChannel, type Client } from "discord.js";
import { AsyncQueue } from "../lib/asyncQueue.js";
import { GatewayTransportError } from "../lib/errors.js";
import { CANCELLED, raceAbort } from "../lib/raceAbort.js";
import type { GatewayEvent, GatewayEventSource, ThreadCreatedEvent } from "./types.js";

type SourceItem = { ok: true; event: GatewayEvent } | { ok: false; error: GatewayTransportError };

export function toThreadCreatedEvent(
  thread: Pick<AnyThreadChannel, "id" | "parentId" | "guildId" | "name">,
  newlyCreated: boolean
): ThreadCreatedEvent {
  return {
    id: thread.id,
    parentId: thread.parentId ?? null,
    guildId: thread.guildId ?? null,
    name: thread.name,
    newlyCreated,
  };
}

export class DiscordGatewaySource implements GatewayEventSource {
  private readonly queue = new AsyncQueue<SourceItem>();
  private closing: Promise<void> | null = null;

  constructor(private readonly client: Client) {
    client.on(Events.ThreadCreate, (thread, newlyCreated) => {
      this.pushEvent({ kind: "threadCreate", thread: toThreadCreatedEvent(thread, newlyCreated) });
    });

    client.on(Events.ClientReady, (ready) => {
      this.pushEvent({ kind: "ready", tag: ready.user.tag });
    });

    client.on(Events.Error, (err) => {
      this.pushError(new GatewayTransportError(`client error: ${err.message}`, false, { cause: err }));
    });

    client.on(Events.ShardError, (err, shardId) => {
      this.pushError(
        new GatewayTransportError(`shard ${shardId} error: ${err.message}`, false, { cause: err })
      );
    });

    client.on(Events.Invalidated, () => {
      this.pushError(new GatewayTransportError("gateway session invalidated", true));
    });

    client.on(Events.ShardDisconnect, (closeEvent, shardId) => {
      this.pushError(
        new GatewayTransportError(`shard ${shardId} disconnected and will not reconnect`, true, {
          code: closeEvent.code,
        })
      );
    });
  }

  nextEvent(): Promise<GatewayEvent> {
    return this.queue.shift().then((item) => {
      if (!item.ok) throw item.error;
      return item.event;
    });
  }

  /**
   * Stop queueing and destroy the client. Repeated calls share the first close.
   * Listeners stay attached so discord.js always has an "error" listener; the
   * closed queue drops whatever they push.
   */
  close(reason: string): Promise<void> {
    if (!this.closing) {
      this.queue.close(new GatewayTransportError(`gateway source closed: ${reason}`, true));
      this.closing = Promise.resolve(this.client.destroy());
    }
    return this.closing;
  }

  private pushEvent(event: GatewayEvent): void {
    this.queue.push({ ok: true, event });
  }

  private pushError(error: GatewayTransportError): void {
    this.queue.push({ ok: false, error });
  }
}

/**
 * Log in, giving up early if shutdown is requested while the login is still
 * in flight. Resolves false when cancelled; the abandoned login is left to
 * settle on its own and the caller's close() destroys the client.
 *
 * @throws whatever client.login() rejects with, if it fails before shutdown
 */
export async function loginUntilAborted(
  client: Pick<Client, "login">,
  token: string,
  signal: AbortSignal
): Promise<boolean> {
  const result = await raceAbort(client.login(token), signal);
  return result !== CANCELLED;
}
