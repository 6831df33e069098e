/**
 * Forum Upvote — src/gateway/eventLoop.ts
 * WHAT: Pulls gateway events one at a time and dispatches thread creations.
 * FLOWS:
 *  - running: race nextEvent() against the shutdown signal each iteration
 *    - event → threadCreate? → handleThreadCreate (errors logged, loop continues)
 *    - recoverable source error → warn, continue
 *    - fatal source error or shutdown signal → shutting_down
 *  - shutting_down: source.close(reason) once (failure logged) → closed
 *
 * Events are handled strictly in delivery order; the next one is not pulled
 * until the previous handler has settled. Cancellation is only observed
 * between events, so a handler already running always finishes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { AppState } from "../lib/appState.js";
import { CLOSE_REASON_FATAL, CLOSE_REASON_SHUTDOWN } from "../lib/constants.js";
import { classifyError, errorContext, isFatalTransportError } from "../lib/errors.js";
import { wrapEvent } from "../lib/eventWrap.js";
import { logger } from "../lib/logger.js";
import { CANCELLED, raceAbort } from "../lib/raceAbort.js";
import { handleThreadCreate } from "../events/threadCreate.js";
import type { GatewayEvent, GatewayEventSource, ThreadCreatedEvent } from "./types.js";

export type LoopState = "running" | "shutting_down" | "closed";

export type LoopExit =
  | { reason: "cancelled"; signal: string }
  | { reason: "fatal_transport"; error: unknown };

export interface EventLoopOptions {
  /** Log every received event at trace level */
  traceEvents?: boolean;
}

type Received = { ok: true; event: GatewayEvent } | { ok: false; error: unknown };

// Folds a rejection into a value so a dropped nextEvent() can never surface
// as an unhandled rejection.
function settle(pending: Promise<GatewayEvent>): Promise<Received> {
  return pending.then(
    (event): Received => ({ ok: true, event }),
    (error: unknown): Received => ({ ok: false, error })
  );
}

function signalName(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return typeof reason === "string" ? reason : String(reason);
}

export class EventLoop {
  private current: LoopState = "running";
  private started = false;
  private processedCount = 0;
  private failedCount = 0;
  private readonly onThreadCreate: (thread: ThreadCreatedEvent) => Promise<boolean>;

  constructor(
    app: AppState,
    private readonly source: GatewayEventSource,
    private readonly shutdown: AbortSignal,
    private readonly options: EventLoopOptions = {}
  ) {
    this.onThreadCreate = wrapEvent("threadCreate", (thread: ThreadCreatedEvent) =>
      handleThreadCreate(app, thread)
    );
  }

  get state(): LoopState {
    return this.current;
  }

  /** Thread events dispatched to the handler so far */
  get processed(): number {
    return this.processedCount;
  }

  /** Thread events whose handler failed */
  get failed(): number {
    return this.failedCount;
  }

  /**
   * Run until shutdown or a fatal source error, then close the source.
   * May only be called once.
   */
  async run(): Promise<LoopExit> {
    if (this.started) {
      throw new Error("EventLoop.run() may only be called once");
    }
    this.started = true;

    const exit = await this.consume();

    this.current = "shutting_down";
    await this.closeSource(exit);
    this.current = "closed";

    logger.info(
      { reason: exit.reason, processed: this.processedCount, failed: this.failedCount },
      "[loop] closed"
    );
    return exit;
  }

  private async consume(): Promise<LoopExit> {
    for (;;) {
      if (this.shutdown.aborted) {
        return { reason: "cancelled", signal: signalName(this.shutdown) };
      }

      const next = await raceAbort(settle(this.source.nextEvent()), this.shutdown);
      if (next === CANCELLED) {
        return { reason: "cancelled", signal: signalName(this.shutdown) };
      }

      if (!next.ok) {
        const classified = classifyError(next.error);
        if (isFatalTransportError(next.error)) {
          logger.error(
            { ...errorContext(classified), err: next.error },
            "[loop] fatal error receiving event"
          );
          return { reason: "fatal_transport", error: next.error };
        }
        logger.warn({ ...errorContext(classified), err: next.error }, "[loop] error receiving event");
        continue;
      }

      if (this.options.traceEvents) {
        logger.trace({ event: next.event }, "[loop] got new event");
      }
      await this.dispatch(next.event);
    }
  }

  private async dispatch(event: GatewayEvent): Promise<void> {
    switch (event.kind) {
      case "threadCreate": {
        this.processedCount++;
        const ok = await this.onThreadCreate(event.thread);
        if (!ok) this.failedCount++;
        return;
      }

      case "ready":
        logger.info({ tag: event.tag }, "[loop] gateway ready");
        return;
    }
  }

  private async closeSource(exit: LoopExit): Promise<void> {
    const reason = exit.reason === "cancelled" ? CLOSE_REASON_SHUTDOWN : CLOSE_REASON_FATAL;
    try {
      await this.source.close(reason);
      logger.debug({ reason }, "[loop] gateway source closed");
    } catch (err) {
      logger.warn({ err, reason }, "[loop] failed to close gateway source (non-fatal)");
    }
  }
}
