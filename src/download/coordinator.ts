import type { Dispatcher } from "undici";
import { AppConfig } from "../config";
import { FetchFn } from "../core/fetch";
import { CancelledError, NamingConflictError, NetworkError, toFailure } from "../errors";
import {
  consumeProgress,
  LogProgressReporter,
  Logger,
  MetricsRegistry,
  ProgressChannel,
  ProgressEvent,
  ProgressReporter,
} from "../observability";
import { createPdfTitleReader, destinationKey, PdfTitleReader, resolveFileName } from "../naming";
import { Sink } from "../sink";
import { ArchiveStore, CurrentRecord } from "../store";
import { Entry, EntryOutcome, FetchResult, RunSummary } from "../types";
import { processWithConcurrency } from "./concurrency";
import { fetchEntry } from "./fetcher";

const TRANSFER_EVENT_STEP_BYTES = 1024 * 1024;
const DEFAULT_STAGING_MAX_AGE_MS = 60 * 60 * 1000;

export interface CoordinatorDeps {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  store: ArchiveStore;
  sink: Sink;
  fetchFn?: FetchFn;
  dispatcher?: Dispatcher;
  readTitle?: PdfTitleReader;
  reporter?: ProgressReporter;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  stagingMaxAgeMs?: number;
}

interface Candidate {
  entry: Entry;
  fetched: FetchResult;
  fileName?: string;
}

/**
 * Brings the archive up to date with the given entries.
 *
 * Fetches run on a bounded pool. Every entry whose fingerprint differs from
 * its current record becomes a promotion candidate; candidates are named only
 * after all fetches settle so that two entries resolving to the same file are
 * both rejected instead of one silently replacing the other. Each identifier
 * is handled by exactly one worker per run.
 */
export async function runUpdate(deps: CoordinatorDeps, entries: readonly Entry[]): Promise<RunSummary> {
  const { config, logger, metrics, store, signal } = deps;
  const readTitle = deps.readTitle ?? createPdfTitleReader();
  const outcomes = new Map<string, EntryOutcome>();
  const candidates: Candidate[] = [];
  const channel = new ProgressChannel<ProgressEvent>(config.progressQueueCapacity);
  const reporter = deps.reporter ?? new LogProgressReporter(logger.child("progress"), entries.length);
  const consumer = consumeProgress(channel, reporter);

  metrics.incrementCounter("entries_total", entries.length);

  const finish = (outcome: EntryOutcome): void => {
    outcomes.set(outcome.entryId, outcome);
    metrics.incrementCounter(
      outcome.status === "unchanged" ? "entries_unchanged" : outcome.status === "updated" ? "entries_updated" : "entries_failed",
    );
    channel.tryPush({
      kind: "complete",
      entryId: outcome.entryId,
      status: outcome.status,
      bytes: outcome.bytes,
      error: outcome.error?.message,
    });
  };

  const fail = (entry: Entry, error: unknown, bytes = 0): void => {
    const failure = toFailure(error);
    const fields = { entryId: entry.id, url: entry.url, kind: failure.kind, error: failure.message };
    if (failure.kind === "io" || failure.kind === "archive_corruption") {
      logger.error("entry_failed", fields);
    } else {
      logger.warn("entry_failed", fields);
    }
    finish({
      entryId: entry.id,
      url: entry.url,
      status: "failed",
      bytes,
      error: failure,
      finishedAt: new Date().toISOString(),
    });
  };

  try {
    const swept = await store.sweepStaging(deps.stagingMaxAgeMs ?? DEFAULT_STAGING_MAX_AGE_MS);
    if (swept > 0) {
      logger.warn("staging_orphans_removed", { count: swept });
    }

    await processWithConcurrency(
      entries,
      config.concurrency,
      async (entry) => {
        const stagedPath = store.createStagingPath(entry.id);
        let lastReported = 0;
        try {
          const fetched = await fetchEntry(
            {
              config,
              logger,
              metrics,
              fetchFn: deps.fetchFn,
              dispatcher: deps.dispatcher,
              sleep: deps.sleep,
            },
            entry,
            stagedPath,
            {
              signal,
              onProgress: (bytes) => {
                if (bytes - lastReported >= TRANSFER_EVENT_STEP_BYTES) {
                  lastReported = bytes;
                  channel.tryPush({ kind: "transfer", entryId: entry.id, bytes });
                }
              },
            },
          );
          metrics.incrementCounter("fetch_ok");

          const current = await store.readCurrent(entry.id);
          if (current && current.sha256 === fetched.sha256 && (await store.currentFileExists(current))) {
            await store.discardStaged(stagedPath);
            logger.info("entry_unchanged", { entryId: entry.id, path: current.path });
            finish({
              entryId: entry.id,
              url: entry.url,
              status: "unchanged",
              path: current.path,
              sha256: current.sha256,
              bytes: fetched.bytes,
              finishedAt: new Date().toISOString(),
            });
            return;
          }

          candidates.push({ entry, fetched });
        } catch (error) {
          if (error instanceof NetworkError) {
            metrics.incrementCounter("fetch_failed");
          }
          await store.discardStaged(stagedPath);
          fail(entry, error);
        }
      },
      signal,
    );

    if (!signal?.aborted) {
      await nameCandidates(deps, readTitle, candidates, fail);
      const rejected = await rejectConflicts(store, candidates, outcomes);
      for (const { candidate, error } of rejected) {
        await store.discardStaged(candidate.fetched.stagedPath);
        metrics.incrementCounter("naming_conflicts");
        fail(candidate.entry, error, candidate.fetched.bytes);
      }
    }

    const promotable = candidates.filter((candidate) => candidate.fileName !== undefined && !outcomes.has(candidate.entry.id));
    await processWithConcurrency(
      promotable,
      config.concurrency,
      async (candidate) => {
        const { entry, fetched } = candidate;
        const fileName = candidate.fileName;
        if (fileName === undefined) {
          return;
        }
        const stopTimer = metrics.startTimer("promote_ms");
        try {
          const result = await store.promote({
            entryId: entry.id,
            url: entry.url,
            stagedPath: fetched.stagedPath,
            sha256: fetched.sha256,
            bytes: fetched.bytes,
            fileName,
          });
          const durationMs = stopTimer();
          logger.info("entry_updated", {
            entryId: entry.id,
            path: result.record.path,
            archivedPath: result.archived?.path,
            adoptedPath: result.adopted?.path,
            durationMs,
          });
          finish({
            entryId: entry.id,
            url: entry.url,
            status: "updated",
            path: result.record.path,
            sha256: result.record.sha256,
            bytes: fetched.bytes,
            finishedAt: new Date().toISOString(),
          });
        } catch (error) {
          stopTimer();
          if (error instanceof NamingConflictError) {
            metrics.incrementCounter("naming_conflicts");
          }
          await store.discardStaged(fetched.stagedPath);
          fail(entry, error, fetched.bytes);
        }
      },
      signal,
    );

    for (const candidate of candidates) {
      if (!outcomes.has(candidate.entry.id)) {
        await store.discardStaged(candidate.fetched.stagedPath);
      }
    }
    for (const entry of entries) {
      if (!outcomes.has(entry.id)) {
        fail(entry, new CancelledError());
      }
    }
  } finally {
    channel.close();
    await consumer;
    metrics.incrementCounter("progress_dropped", channel.dropped);
  }

  const summary = summarize(deps.runId, entries, outcomes);
  logger.info("run_summary", {
    total: summary.total,
    unchanged: summary.unchanged,
    updated: summary.updated,
    failed: summary.failed,
    failures: summary.failures,
  });

  await deps.sink.publishOutcomes(summary.outcomes.filter((outcome) => outcome.status !== "unchanged"));
  return summary;
}

async function nameCandidates(
  deps: CoordinatorDeps,
  readTitle: PdfTitleReader,
  candidates: Candidate[],
  fail: (entry: Entry, error: unknown, bytes?: number) => void,
): Promise<void> {
  const namerDeps = { mode: deps.config.namingMode, readTitle, logger: deps.logger };
  await processWithConcurrency(candidates, deps.config.concurrency, async (candidate) => {
    try {
      const resolved = await resolveFileName(namerDeps, candidate.entry, candidate.fetched.stagedPath);
      candidate.fileName = resolved.fileName;
      deps.logger.debug("entry_named", {
        entryId: candidate.entry.id,
        fileName: resolved.fileName,
        source: resolved.source,
      });
    } catch (error) {
      await deps.store.discardStaged(candidate.fetched.stagedPath);
      fail(candidate.entry, error, candidate.fetched.bytes);
    }
  });
}

interface RejectedCandidate {
  candidate: Candidate;
  claimants: string[];
  error: NamingConflictError;
}

/**
 * Every destination is claimed by the current record of each tracked entry,
 * candidates included, since a candidate keeps its file until it is
 * promoted, and by the new names of the candidates. A key claimed by more
 * than one identifier rejects every candidate claiming it; files already in
 * place are left alone.
 */
async function rejectConflicts(
  store: ArchiveStore,
  candidates: Candidate[],
  outcomes: Map<string, EntryOutcome>,
): Promise<RejectedCandidate[]> {
  const named = candidates.filter((candidate) => candidate.fileName !== undefined && !outcomes.has(candidate.entry.id));
  const claims = new Map<string, { fileName: string; ids: Set<string> }>();
  const claim = (fileName: string, entryId: string) => {
    const key = destinationKey(fileName);
    const existing = claims.get(key) ?? { fileName, ids: new Set<string>() };
    existing.ids.add(entryId);
    claims.set(key, existing);
  };

  const currentRecords: CurrentRecord[] = await store.listCurrent();
  for (const record of currentRecords) {
    claim(record.fileName, record.entryId);
  }
  for (const candidate of named) {
    if (candidate.fileName !== undefined) {
      claim(candidate.fileName, candidate.entry.id);
    }
  }

  const rejected: RejectedCandidate[] = [];
  for (const candidate of named) {
    if (candidate.fileName === undefined) {
      continue;
    }
    const group = claims.get(destinationKey(candidate.fileName));
    if (group && group.ids.size > 1) {
      const claimants = [...group.ids].sort();
      rejected.push({ candidate, claimants, error: new NamingConflictError(group.fileName, claimants) });
    }
  }
  return rejected;
}

function summarize(runId: string, entries: readonly Entry[], outcomes: Map<string, EntryOutcome>): RunSummary {
  const ordered: EntryOutcome[] = [];
  for (const entry of entries) {
    const outcome = outcomes.get(entry.id);
    if (outcome) {
      ordered.push(outcome);
    }
  }

  const failures = ordered.flatMap((outcome) =>
    outcome.status === "failed" && outcome.error
      ? [{ entryId: outcome.entryId, kind: outcome.error.kind, message: outcome.error.message }]
      : [],
  );

  return {
    runId,
    total: entries.length,
    unchanged: ordered.filter((outcome) => outcome.status === "unchanged").length,
    updated: ordered.filter((outcome) => outcome.status === "updated").length,
    failed: failures.length,
    failures,
    outcomes: ordered,
  };
}
