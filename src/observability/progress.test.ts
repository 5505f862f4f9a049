import { describe, expect, it } from "vitest";
import { Logger } from "./logger";
import { consumeProgress, LogProgressReporter, ProgressChannel, ProgressEvent } from "./progress";

function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ component: "progress", runId: "run_test" }, { minLevel: "info", write: (_level, line) => lines.push(line) });
  return { logger, lines };
}

describe("ProgressChannel", () => {
  it("drops events instead of blocking when full", () => {
    const channel = new ProgressChannel<number>(2);

    expect(channel.tryPush(1)).toBe(true);
    expect(channel.tryPush(2)).toBe(true);
    expect(channel.tryPush(3)).toBe(false);
    expect(channel.size).toBe(2);
    expect(channel.dropped).toBe(1);
  });

  it("delivers buffered events and then ends once closed", async () => {
    const channel = new ProgressChannel<number>(4);
    channel.tryPush(1);
    channel.tryPush(2);
    channel.close();

    const seen: number[] = [];
    for await (const value of channel) {
      seen.push(value);
    }

    expect(seen).toEqual([1, 2]);
    expect(channel.tryPush(3)).toBe(false);
    expect(channel.dropped).toBe(1);
  });

  it("hands events straight to a waiting consumer", async () => {
    const channel = new ProgressChannel<string>(1);
    const iterator = channel[Symbol.asyncIterator]();
    const pending = iterator.next();

    channel.tryPush("a");
    channel.tryPush("b");

    await expect(pending).resolves.toEqual({ value: "a", done: false });
    await expect(iterator.next()).resolves.toEqual({ value: "b", done: false });
  });
});

describe("LogProgressReporter", () => {
  it("tallies completions by status", async () => {
    const { logger, lines } = captureLogger();
    const reporter = new LogProgressReporter(logger, 3);
    const channel = new ProgressChannel<ProgressEvent>(8);
    const consumer = consumeProgress(channel, reporter);

    channel.tryPush({ kind: "transfer", entryId: "A", bytes: 2048 });
    channel.tryPush({ kind: "complete", entryId: "A", status: "updated", bytes: 4096 });
    channel.tryPush({ kind: "complete", entryId: "B", status: "unchanged", bytes: 10 });
    channel.tryPush({ kind: "complete", entryId: "C", status: "failed", bytes: 0, error: "HTTP 404" });
    channel.close();
    await consumer;

    expect(reporter.snapshot()).toEqual({ total: 3, completed: 3, unchanged: 1, updated: 1, failed: 1, bytes: 4106 });
    const messages = lines.map((line) => JSON.parse(line).msg);
    expect(messages).toEqual(["progress", "progress", "progress", "progress_done"]);
    expect(JSON.parse(lines[2])).toMatchObject({ entryId: "C", status: "failed", completed: 3, percent: 100, error: "HTTP 404" });
  });
});
