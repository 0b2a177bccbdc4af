/**
 * Tests for the async Mutex.
 */

import { describe, it, expect } from "vitest";
import { Mutex } from "../src/mutex.js";

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe("Mutex", () => {
  it("should run exclusive sections one after another", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const first = mutex.runExclusive(async () => {
      events.push("a:start");
      await sleep(5);
      events.push("a:end");
    });
    const second = mutex.runExclusive(() => {
      events.push("b:start");
      events.push("b:end");
    });
    await Promise.all([first, second]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("should grant waiters in arrival order", async () => {
    const mutex = new Mutex();
    const order: number[] = [];
    const release = await mutex.acquire();

    const waiters = [1, 2, 3].map((n) => mutex.runExclusive(() => order.push(n)));
    expect(mutex.pending).toBe(3);

    release();
    await Promise.all(waiters);
    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked).toBe(false);
  });

  it("should return the section's value", async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });

  it("should release the lock when the section throws", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(mutex.isLocked).toBe(false);
  });

  it("should ignore a second release", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const next = mutex.acquire();

    release();
    release();
    const releaseNext = await next;

    expect(mutex.isLocked).toBe(true);
    releaseNext();
    expect(mutex.isLocked).toBe(false);
  });
});
