import { describe, expect, it } from "vitest";
import { processWithConcurrency } from "./concurrency";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((done) => {
    resolve = () => done();
  });
  return { promise, resolve };
}

describe("processWithConcurrency", () => {
  it("hands every item to exactly one call", async () => {
    const seen: number[] = [];

    await processWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      seen.push(item);
    });

    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it("keeps at most the given number of calls in flight", async () => {
    let active = 0;
    let peak = 0;

    await processWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active -= 1;
    });

    expect(peak).toBe(3);
  });

  it("rounds a fractional limit down", async () => {
    let active = 0;
    let peak = 0;

    await processWithConcurrency([1, 2, 3, 4], 2.5, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active -= 1;
    });

    expect(peak).toBe(2);
  });

  it("stops pulling items once aborted", async () => {
    const controller = new AbortController();
    const gate = deferred();
    const started: string[] = [];

    const run = processWithConcurrency(
      ["a", "b", "c", "d"],
      1,
      async (item) => {
        started.push(item);
        if (item === "a") {
          await gate.promise;
        }
      },
      controller.signal,
    );
    controller.abort();
    gate.resolve();
    await run;

    expect(started).toEqual(["a"]);
  });

  it("does nothing for an empty list", async () => {
    let calls = 0;

    await processWithConcurrency([], 4, async () => {
      calls += 1;
    });

    expect(calls).toBe(0);
  });
});
