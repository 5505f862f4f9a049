import path from "node:path";
import { AppConfig } from "../config";
import { runUpdate } from "../download/coordinator";
import { generateIndexPage } from "../indexPage";
import { Manifest, ManifestCategory } from "../manifest";
import { PdfTitleReader } from "../naming";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { ArchiveStore } from "../store";
import { Entry, RunSummary } from "../types";
import { createFetchDispatcher, FetchFn } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: ArchiveStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
}

export interface SyncOptions {
  signal?: AbortSignal;
  fetchFn?: FetchFn;
  readTitle?: PdfTitleReader;
}

export type SyncContext = Omit<CommandContext, "store" | "sink">;

export interface SyncTarget {
  store: ArchiveStore;
  sink: Sink;
}

export type OpenSyncTarget = (config: AppConfig, category: ManifestCategory) => SyncTarget;

/** Output directory and naming mode for one category. The manifest's filename_mode wins over the configured one. */
export function categoryConfig(config: AppConfig, category: ManifestCategory): AppConfig {
  return {
    ...config,
    outputDir: category.folder ? path.resolve(config.outputDir, category.folder) : config.outputDir,
    namingMode: category.namingMode ?? config.namingMode,
  };
}

/**
 * Syncs each manifest category into its own archive, one after another. Each
 * category gets a store and sink from `openTarget`; the store is closed before
 * the next category starts.
 */
export async function runManifestSync(
  ctx: SyncContext,
  manifest: Manifest,
  openTarget: OpenSyncTarget,
  options: SyncOptions = {},
): Promise<RunSummary[]> {
  const summaries: RunSummary[] = [];
  for (const category of manifest.categories) {
    const config = categoryConfig(ctx.config, category);
    const { store, sink } = openTarget(config, category);
    try {
      ctx.logger.info("category_start", {
        category: category.name,
        outputDir: store.outputDir,
        namingMode: config.namingMode,
      });
      summaries.push(await runSync({ ...ctx, config, store, sink }, category.entries, options));
    } finally {
      await store.close();
    }
  }
  return summaries;
}

export async function runSync(ctx: CommandContext, entries: readonly Entry[], options: SyncOptions = {}): Promise<RunSummary> {
  ctx.logger.info("sync_start", {
    entries: entries.length,
    concurrency: ctx.config.concurrency,
    namingMode: ctx.config.namingMode,
    outputDir: ctx.store.outputDir,
  });

  const dispatcher = createFetchDispatcher({
    ignoreHttpsErrors: ctx.config.ignoreHttpsErrors,
    connectionsPerOrigin: ctx.config.concurrency,
  });

  let summary: RunSummary;
  try {
    summary = await runUpdate(
      {
        runId: ctx.runId,
        config: ctx.config,
        logger: ctx.logger,
        metrics: ctx.metrics,
        store: ctx.store,
        sink: ctx.sink,
        fetchFn: options.fetchFn,
        dispatcher,
        readTitle: options.readTitle,
        signal: options.signal,
      },
      entries,
    );
  } finally {
    await dispatcher.close();
  }

  if (ctx.config.generateIndexHtml && summary.updated > 0) {
    await runIndex(ctx);
  }

  for (const failure of summary.failures) {
    ctx.logger.error("sync_entry_failed", { entryId: failure.entryId, kind: failure.kind, error: failure.message });
  }
  ctx.logger.info("sync_complete", {
    total: summary.total,
    unchanged: summary.unchanged,
    updated: summary.updated,
    failed: summary.failed,
  });
  return summary;
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start", { outputDir: ctx.store.outputDir });
  const stats = await ctx.store.getStats();
  ctx.logger.info("status_complete", { stats });
}

export async function runHistory(ctx: CommandContext, entryId: string): Promise<boolean> {
  const current = await ctx.store.readCurrent(entryId);
  if (!current) {
    ctx.logger.warn("history_unknown_entry", { entryId });
    return false;
  }

  const history = await ctx.store.listHistory(entryId);
  ctx.logger.info("history_complete", {
    entryId,
    current: {
      path: current.path,
      sha256: current.sha256,
      bytes: current.bytes,
      updatedAt: current.updatedAt,
    },
    history: history.map((version) => ({
      path: version.path,
      sha256: version.sha256,
      bytes: version.bytes,
      archivedAt: version.archivedAt,
    })),
  });
  return true;
}

export async function runIndex(ctx: CommandContext): Promise<string> {
  const records = await ctx.store.listCurrent();
  const location = await generateIndexPage(
    ctx.store.outputDir,
    records.map((record) => record.fileName),
  );
  ctx.logger.info("index_page_written", { path: location, files: records.length });
  return location;
}
