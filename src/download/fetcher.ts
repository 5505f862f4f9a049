import crypto from "node:crypto";
import fs from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Dispatcher } from "undici";
import { AppConfig } from "../config";
import { defaultFetch, FetchFn } from "../core/fetch";
import { CancelledError, errorMessage, IOError, NetworkError } from "../errors";
import { Logger, MetricsRegistry } from "../observability";
import { Entry, FetchResult } from "../types";

export interface FetcherDeps {
  config: Pick<AppConfig, "userAgent" | "downloadTimeoutMs" | "maxDownloadAttempts" | "requirePdf">;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  dispatcher?: Dispatcher;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchEntryOptions {
  signal?: AbortSignal;
  onProgress?: (bytesSoFar: number) => void;
}

interface AttemptOutcome {
  statusCode: number;
  resolvedUrl?: string;
  contentType?: string;
  sha256?: string;
  bytes?: number;
  looksLikePdf?: boolean;
}

const PDF_MAGIC = Buffer.from("%PDF-");

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function backoffMs(attempt: number): number {
  return Math.min(1000 * 2 ** (attempt - 1), 10_000);
}

function isPdfResponse(outcome: AttemptOutcome): boolean {
  if (outcome.looksLikePdf) {
    return true;
  }
  if (outcome.contentType?.toLowerCase().includes("application/pdf")) {
    return true;
  }
  return Boolean(outcome.resolvedUrl?.toLowerCase().includes(".pdf"));
}

async function downloadAttempt(
  url: string,
  stagedPath: string,
  deps: FetcherDeps,
  options: FetchEntryOptions,
): Promise<AttemptOutcome> {
  const fetchFn = deps.fetchFn ?? defaultFetch;
  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new NetworkError(`timed out after ${deps.config.downloadTimeoutMs}ms`)),
    deps.config.downloadTimeoutMs,
  );
  const onParentAbort = () => controller.abort(new CancelledError());
  options.signal?.addEventListener("abort", onParentAbort, { once: true });

  try {
    const response = await fetchFn(url, {
      method: "GET",
      headers: {
        "user-agent": deps.config.userAgent,
        accept: "application/pdf,*/*",
      },
      dispatcher: deps.dispatcher,
      signal: controller.signal,
      redirect: "follow",
    });

    if (!response.ok) {
      await response.body?.cancel();
      return { statusCode: response.status, resolvedUrl: response.url || undefined };
    }

    if (!response.body) {
      return { statusCode: 500, resolvedUrl: response.url || undefined };
    }

    const hash = crypto.createHash("sha256");
    let bytes = 0;
    let head = Buffer.alloc(0);

    const writable = fs.createWriteStream(stagedPath, { flags: "wx" });
    const readable = Readable.fromWeb(response.body);
    // A transport failure also destroys the writable with the same error, so
    // only an error that starts on the write side counts as a disk failure.
    let readError: unknown;
    let writeError: unknown;
    readable.once("error", (error: unknown) => {
      readError = error;
    });
    writable.once("error", (error: unknown) => {
      if (readError === undefined) {
        writeError = error;
      }
    });
    readable.on("data", (chunk: unknown) => {
      const buffer = Buffer.isBuffer(chunk)
        ? chunk
        : chunk instanceof Uint8Array
          ? Buffer.from(chunk)
          : Buffer.from(String(chunk));
      hash.update(buffer);
      bytes += buffer.length;
      if (head.length < PDF_MAGIC.length) {
        head = Buffer.concat([head, buffer.subarray(0, PDF_MAGIC.length - head.length)]);
      }
      options.onProgress?.(bytes);
    });

    try {
      await pipeline(readable, writable);
    } catch (error) {
      await fs.promises.rm(stagedPath, { force: true });
      if (writeError !== undefined && !controller.signal.aborted) {
        throw new IOError(`could not write ${stagedPath}: ${errorMessage(writeError)}`, writeError);
      }
      throw error;
    }

    return {
      statusCode: response.status,
      resolvedUrl: response.url || undefined,
      contentType: response.headers.get("content-type") ?? undefined,
      sha256: hash.digest("hex"),
      bytes,
      looksLikePdf: head.equals(PDF_MAGIC),
    };
  } catch (error) {
    const reason: unknown = controller.signal.reason;
    if (controller.signal.aborted && (reason instanceof CancelledError || reason instanceof NetworkError)) {
      throw reason;
    }
    throw error;
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Streams one entry into `stagedPath`, hashing as it goes. Transient failures
 * (429, 5xx, thrown network errors) are retried with capped exponential
 * backoff. Disk failures surface as `IOError` without a retry. The staged
 * file never survives a failed call.
 */
export async function fetchEntry(
  deps: FetcherDeps,
  entry: Entry,
  stagedPath: string,
  options: FetchEntryOptions = {},
): Promise<FetchResult> {
  const { config, logger, metrics } = deps;
  const wait = deps.sleep ?? sleep;
  let lastError: NetworkError | undefined;

  for (let attempt = 1; attempt <= config.maxDownloadAttempts; attempt += 1) {
    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    const stopTimer = metrics.startTimer("fetch_ms");
    logger.debug("fetch_attempt_start", { entryId: entry.id, url: entry.url, attempt });

    let outcome: AttemptOutcome;
    try {
      outcome = await downloadAttempt(entry.url, stagedPath, deps, options);
    } catch (error) {
      const durationMs = stopTimer();
      await fs.promises.rm(stagedPath, { force: true });
      if (error instanceof CancelledError || error instanceof IOError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      lastError = error instanceof NetworkError ? error : new NetworkError(message, undefined, error);
      logger.warn("fetch_attempt_error", { entryId: entry.id, url: entry.url, attempt, durationMs, error: message });
      if (attempt < config.maxDownloadAttempts) {
        await wait(backoffMs(attempt));
      }
      continue;
    }

    const durationMs = stopTimer();
    if (outcome.statusCode >= 400) {
      lastError = new NetworkError(`HTTP ${outcome.statusCode}`, outcome.statusCode);
      const retriable = isRetriableStatus(outcome.statusCode);
      logger.warn(retriable ? "fetch_attempt_retry_http" : "fetch_failed_http", {
        entryId: entry.id,
        url: entry.url,
        attempt,
        durationMs,
        statusCode: outcome.statusCode,
      });
      if (!retriable) {
        throw lastError;
      }
      if (attempt < config.maxDownloadAttempts) {
        await wait(backoffMs(attempt));
      }
      continue;
    }

    if (outcome.sha256 === undefined || outcome.bytes === undefined) {
      lastError = new NetworkError(`HTTP ${outcome.statusCode} without a body`, outcome.statusCode);
      throw lastError;
    }

    if (config.requirePdf && !isPdfResponse(outcome)) {
      await fs.promises.rm(stagedPath, { force: true });
      throw new NetworkError(
        `not a PDF (content-type ${outcome.contentType ?? "unknown"}, url ${outcome.resolvedUrl ?? entry.url})`,
        outcome.statusCode,
      );
    }

    logger.debug("fetch_ok", { entryId: entry.id, url: entry.url, attempt, durationMs, bytes: outcome.bytes });
    return {
      entryId: entry.id,
      url: entry.url,
      resolvedUrl: outcome.resolvedUrl,
      stagedPath,
      sha256: outcome.sha256,
      bytes: outcome.bytes,
      contentType: outcome.contentType,
      attempt,
      fetchedAt: new Date().toISOString(),
    };
  }

  throw lastError ?? new NetworkError("download failed");
}
