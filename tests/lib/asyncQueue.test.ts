/**
 * Forum Upvote — tests/lib/asyncQueue.test.ts
 * WHAT: Unit tests for the FIFO bridging pushed events to awaited ones.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { AsyncQueue } from "../../src/lib/asyncQueue.js";

describe("AsyncQueue", () => {
  it("hands out buffered items in push order", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    expect(queue.pending).toBe(2);

    await expect(queue.shift()).resolves.toBe(1);
    await expect(queue.shift()).resolves.toBe(2);
    expect(queue.pending).toBe(0);
  });

  it("resolves waiters in the order they asked", async () => {
    const queue = new AsyncQueue<string>();
    const first = queue.shift();
    const second = queue.shift();

    queue.push("a");
    queue.push("b");

    await expect(first).resolves.toBe("a");
    await expect(second).resolves.toBe("b");
    expect(queue.pending).toBe(0);
  });

  it("rejects waiting and later shifts after close", async () => {
    const queue = new AsyncQueue<string>();
    const waiting = queue.shift();
    const reason = new Error("closed");

    queue.close(reason);

    await expect(waiting).rejects.toBe(reason);
    await expect(queue.shift()).rejects.toBe(reason);
    expect(queue.closed).toBe(true);
  });

  it("discards buffered items and ignores pushes after close", async () => {
    const queue = new AsyncQueue<string>();
    queue.push("left behind");
    queue.close(new Error("closed"));
    queue.push("too late");

    expect(queue.pending).toBe(0);
    await expect(queue.shift()).rejects.toThrow("closed");
  });

  it("keeps the first close reason", async () => {
    const queue = new AsyncQueue<string>();
    queue.close(new Error("first"));
    queue.close(new Error("second"));

    await expect(queue.shift()).rejects.toThrow("first");
  });
});
