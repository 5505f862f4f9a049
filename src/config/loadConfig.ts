import fs from "node:fs";
import path from "node:path";
import { AppConfig, ConfigOverrides, NamingMode, SinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "pdf-archiver/1.0",
  ignoreHttpsErrors: false,
  downloadTimeoutMs: 120_000,
  concurrency: 4,
  namingMode: "by-item",
  outputDir: "downloads",
  historyDirName: "history",
  stagingDirName: ".staging",
  indexFileName: ".archive-index.sqlite",
  maxDownloadAttempts: 3,
  requirePdf: true,
  progressQueueCapacity: 256,
  sinkType: "local_jsonl",
  generateIndexHtml: false,
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return pickOverrides(parsed);
}

function pickOverrides(source: object): ConfigOverrides {
  const values = new Map(Object.entries(source));
  const overrides: ConfigOverrides = {};
  const str = (key: keyof AppConfig): string | undefined => {
    const value = values.get(key);
    return typeof value === "string" ? value : undefined;
  };
  const num = (key: keyof AppConfig): number | undefined => {
    const value = values.get(key);
    return typeof value === "number" && Number.isFinite(value) ? Math.floor(value) : undefined;
  };
  const bool = (key: keyof AppConfig): boolean | undefined => {
    const value = values.get(key);
    return typeof value === "boolean" ? value : undefined;
  };

  overrides.userAgent = str("userAgent");
  overrides.ignoreHttpsErrors = bool("ignoreHttpsErrors");
  overrides.downloadTimeoutMs = num("downloadTimeoutMs");
  overrides.concurrency = num("concurrency");
  overrides.namingMode = toNamingMode(str("namingMode"));
  overrides.outputDir = str("outputDir");
  overrides.historyDirName = str("historyDirName");
  overrides.stagingDirName = str("stagingDirName");
  overrides.indexFileName = str("indexFileName");
  overrides.maxDownloadAttempts = num("maxDownloadAttempts");
  overrides.requirePdf = bool("requirePdf");
  overrides.progressQueueCapacity = num("progressQueueCapacity");
  overrides.sinkType = toSinkType(str("sinkType"));
  overrides.generateIndexHtml = bool("generateIndexHtml");

  return overrides;
}

function applyOverrides(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    userAgent: overrides.userAgent ?? base.userAgent,
    ignoreHttpsErrors: overrides.ignoreHttpsErrors ?? base.ignoreHttpsErrors,
    downloadTimeoutMs: overrides.downloadTimeoutMs ?? base.downloadTimeoutMs,
    concurrency: overrides.concurrency ?? base.concurrency,
    namingMode: overrides.namingMode ?? base.namingMode,
    outputDir: overrides.outputDir ?? base.outputDir,
    historyDirName: overrides.historyDirName ?? base.historyDirName,
    stagingDirName: overrides.stagingDirName ?? base.stagingDirName,
    indexFileName: overrides.indexFileName ?? base.indexFileName,
    maxDownloadAttempts: overrides.maxDownloadAttempts ?? base.maxDownloadAttempts,
    requirePdf: overrides.requirePdf ?? base.requirePdf,
    progressQueueCapacity: overrides.progressQueueCapacity ?? base.progressQueueCapacity,
    sinkType: overrides.sinkType ?? base.sinkType,
    generateIndexHtml: overrides.generateIndexHtml ?? base.generateIndexHtml,
  };
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function toNamingMode(value: string | undefined): NamingMode | undefined {
  return value === "by-item" || value === "by-title" ? value : undefined;
}

function toSinkType(value: string | undefined): SinkType | undefined {
  return value === "local_jsonl" || value === "none" ? value : undefined;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged = applyOverrides(DEFAULT_CONFIG, fileConfig);

  return {
    ...merged,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    concurrency: Math.max(1, toInt(env.CONCURRENCY, merged.concurrency)),
    namingMode: toNamingMode(env.NAMING_MODE) ?? merged.namingMode,
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    maxDownloadAttempts: Math.max(1, toInt(env.MAX_DOWNLOAD_ATTEMPTS, merged.maxDownloadAttempts)),
    requirePdf: toBool(env.REQUIRE_PDF, merged.requirePdf),
    progressQueueCapacity: Math.max(1, toInt(env.PROGRESS_QUEUE_CAPACITY, merged.progressQueueCapacity)),
    sinkType: toSinkType(env.SINK_TYPE?.toLowerCase()) ?? merged.sinkType,
    generateIndexHtml: toBool(env.GENERATE_INDEX_HTML, merged.generateIndexHtml),
  };
}

export { DEFAULT_CONFIG, applyOverrides };
