/**
 * Forum Upvote — src/lib/shutdown.ts
 * WHAT: Turns SIGTERM/SIGINT into a single AbortSignal the event loop waits on.
 * FLOWS:
 *  - first signal → controller.abort(signalName)
 *  - further signals → warn, ignored
 *  - signal after release() (loop already gone) → fatal log, exit(1)
 * DOCS:
 *  - Signal events: https://nodejs.org/api/process.html#signal-events
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

/** Where signals come from; `process` in production */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ShutdownOptions {
  source?: SignalSource;
  exit?: (code: number) => void;
  signals?: readonly NodeJS.Signals[];
}

export interface ShutdownHandle {
  /** Aborted once, with the first received signal's name as the reason */
  readonly signal: AbortSignal;
  /** The receiving side is gone; any later signal terminates the process */
  release(): void;
}

export function installShutdownHandler(options: ShutdownOptions = {}): ShutdownHandle {
  const source = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const signals = options.signals ?? SHUTDOWN_SIGNALS;

  const controller = new AbortController();
  let released = false;

  const onSignal = (signal: NodeJS.Signals) => {
    if (released) {
      logger.fatal({ signal }, "[shutdown] Nothing is listening for shutdown, exiting now");
      exit(1);
      return;
    }
    if (controller.signal.aborted) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");
    controller.abort(signal);
  };

  for (const name of signals) {
    source.on(name, onSignal);
  }
  logger.debug({ signals }, "[shutdown] registered signal handlers");

  return {
    signal: controller.signal,
    release() {
      released = true;
    },
  };
}
