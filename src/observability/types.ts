export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  entryId?: string;
  url?: string;
  path?: string;
  attempt?: number;
  [key: string]: unknown;
}

export const METRIC_COUNTER_NAMES = [
  "entries_total",
  "fetch_ok",
  "fetch_failed",
  "entries_unchanged",
  "entries_updated",
  "entries_failed",
  "naming_conflicts",
  "progress_dropped",
] as const;

export type MetricCounterName = (typeof METRIC_COUNTER_NAMES)[number];

export const METRIC_TIMER_NAMES = ["fetch_ms", "promote_ms"] as const;

export type MetricTimerName = (typeof METRIC_TIMER_NAMES)[number];
