/**
 * Forum Upvote — src/lib/raceAbort.ts
 * WHAT: Race a promise against an AbortSignal without leaking listeners.
 * USAGE:
 *  const next = await raceAbort(source.nextEvent(), shutdown.signal);
 *  if (next === CANCELLED) return;
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const CANCELLED: unique symbol = Symbol("cancelled");

/**
 * Resolve with whichever finishes first: `work` or the abort signal.
 * The losing side is ignored, a late rejection of `work` included. The abort
 * listener is removed once `work` settles, so repeated races on one
 * long-lived signal do not pile up listeners.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T | typeof CANCELLED> {
  return new Promise<T | typeof CANCELLED>((resolve, reject) => {
    const onAbort = () => resolve(CANCELLED);
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
    if (signal.aborted) {
      resolve(CANCELLED);
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
