/**
 * Forum Upvote — src/lib/asyncQueue.ts
 * WHAT: Unbounded FIFO that turns pushed values into awaited ones.
 * FLOWS:
 *  - push(item) → hands it to the oldest waiting shift(), else buffers it
 *  - shift() → oldest buffered item, or waits for the next push
 *  - close(reason) → rejects waiting and future shift() calls with the reason
 *
 * Used to bridge discord.js event emitters into a pull-based event source.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

type Waiter<T> = {
  resolve: (item: T) => void;
  reject: (reason: Error) => void;
};

export class AsyncQueue<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closeReason: Error | null = null;

  /**
   * Add an item. Items pushed after close() are dropped.
   */
  push(item: T): void {
    if (this.closeReason) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return;
    }
    this.buffer.push(item);
  }

  /**
   * Take the oldest item, waiting if none is buffered.
   */
  shift(): Promise<T> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      return Promise.resolve(item);
    }
    if (this.closeReason) {
      return Promise.reject(this.closeReason);
    }
    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Stop accepting items. Buffered items are discarded; waiters are rejected.
   */
  close(reason: Error): void {
    if (this.closeReason) return;
    this.closeReason = reason;
    this.buffer = [];
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(reason);
    }
  }

  /** Number of buffered items not yet taken */
  get pending(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.closeReason !== null;
  }
}
