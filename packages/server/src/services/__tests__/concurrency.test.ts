import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { setTimeout as sleep } from "node:timers/promises";
import { KeyedMutex, runBounded, withTimeout } from "../concurrency.js";
import { CallTimeoutError } from "../../errors.js";

describe("runBounded", () => {
  it("keeps input order and respects the limit", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runBounded([30, 10, 20, 5, 15], 2, async (ms, i) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(ms);
      inFlight--;
      return i * 10;
    });

    assert.deepEqual(results, [0, 10, 20, 30, 40]);
    assert.equal(peak, 2);
  });

  it("starts nothing new after a failure and waits for running work", async () => {
    const started: number[] = [];
    const finished: number[] = [];

    await assert.rejects(
      runBounded([0, 1, 2, 3], 2, async (_item, i) => {
        started.push(i);
        if (i === 0) throw new Error("first failed");
        await sleep(20);
        finished.push(i);
        return i;
      }),
      { message: "first failed" },
    );

    assert.deepEqual(started, [0, 1]);
    assert.deepEqual(finished, [1]);
  });

  it("handles an empty list", async () => {
    assert.deepEqual(await runBounded([], 4, async () => 1), []);
  });
});

describe("withTimeout", () => {
  it("resolves fast calls", async () => {
    assert.equal(await withTimeout(async () => "done", 100), "done");
  });

  it("rejects at the deadline and aborts the inner signal", async () => {
    let innerSignal: AbortSignal | undefined;

    await assert.rejects(
      withTimeout((signal) => {
        innerSignal = signal;
        return new Promise<never>(() => {});
      }, 10),
      CallTimeoutError,
    );
    assert.equal(innerSignal?.aborted, true);
  });

  it("rejects when the parent aborts", async () => {
    const parent = new AbortController();
    const pending = withTimeout(() => new Promise<never>(() => {}), 1000, parent.signal);
    parent.abort(new Error("cancelled"));

    await assert.rejects(pending, { message: "cancelled" });
  });
});

describe("KeyedMutex", () => {
  it("serializes sections that share a key", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.run("a", async () => {
        order.push("a1-start");
        await sleep(20);
        order.push("a1-end");
      }),
      mutex.run("a", async () => {
        order.push("a2");
      }),
      mutex.run("b", async () => {
        order.push("b");
      }),
    ]);

    assert.deepEqual(order, ["a1-start", "b", "a1-end", "a2"]);
  });

  it("releases the key when a section throws", async () => {
    const mutex = new KeyedMutex();

    await assert.rejects(mutex.run("a", async () => Promise.reject(new Error("boom"))));
    assert.equal(await mutex.run("a", async () => "after"), "after");
  });
});
