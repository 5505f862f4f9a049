export type NamingMode = "by-item" | "by-title";

export type SinkType = "local_jsonl" | "none";

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  downloadTimeoutMs: number;
  concurrency: number;
  namingMode: NamingMode;
  outputDir: string;
  historyDirName: string;
  stagingDirName: string;
  indexFileName: string;
  maxDownloadAttempts: number;
  requirePdf: boolean;
  progressQueueCapacity: number;
  sinkType: SinkType;
  generateIndexHtml: boolean;
}

export type ConfigOverrides = Partial<AppConfig>;
