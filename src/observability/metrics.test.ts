import { afterEach, describe, expect, it, vi } from "vitest";
import { MetricsRegistry } from "./metrics";
import { METRIC_COUNTER_NAMES } from "./types";

describe("MetricsRegistry", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("reports every counter, including ones never touched", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("fetch_ok");
    metrics.incrementCounter("fetch_ok", 2);

    const counters = metrics.getCounters();

    expect(Object.keys(counters)).toEqual([...METRIC_COUNTER_NAMES]);
    expect(counters.fetch_ok).toBe(3);
    expect(counters.progress_dropped).toBe(0);
    expect(metrics.getCounter("fetch_ok")).toBe(3);
  });

  it("summarises timer durations", () => {
    vi.useFakeTimers();
    const metrics = new MetricsRegistry();

    const first = metrics.startTimer("fetch_ms");
    vi.advanceTimersByTime(10);
    expect(first()).toBe(10);
    const second = metrics.startTimer("fetch_ms");
    vi.advanceTimersByTime(25);
    second();

    expect(metrics.getTimerSummary("fetch_ms")).toEqual({ count: 2, min: 10, max: 25, avg: 17.5 });
    expect(metrics.getTimerSummaries()).toEqual({
      fetch_ms: { count: 2, min: 10, max: 25, avg: 17.5 },
      promote_ms: { count: 0, min: 0, max: 0, avg: 0 },
    });
  });

  it("prints the summary as one JSON document", () => {
    const printed: string[] = [];
    vi.spyOn(console, "log").mockImplementation((line: string) => {
      printed.push(line);
    });
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("entries_updated");

    metrics.printSummary();

    expect(printed).toHaveLength(1);
    expect(JSON.parse(printed[0] ?? "{}")).toMatchObject({
      level: "info",
      msg: "metrics_summary",
      counters: { entries_updated: 1, entries_failed: 0 },
      timers: { promote_ms: { count: 0 } },
    });
  });
});
