export interface CurrentRecord {
  entryId: string;
  url: string;
  sha256: string;
  /** File name relative to the output directory. */
  fileName: string;
  /** Absolute path of the current file. */
  path: string;
  bytes: number;
  updatedAt: string;
}

export interface HistoricalVersion {
  entryId: string;
  sha256: string;
  fileName: string;
  path: string;
  bytes: number;
  archivedAt: string;
}

export interface PromoteRequest {
  entryId: string;
  url: string;
  stagedPath: string;
  sha256: string;
  bytes: number;
  fileName: string;
}

export interface PromoteResult {
  record: CurrentRecord;
  /** The entry's previous current file, when its bytes differ from the new ones. */
  archived?: HistoricalVersion;
  /** An unrecorded file that sat at the new destination. */
  adopted?: HistoricalVersion;
}

export interface ArchiveStats {
  trackedEntries: number;
  historyVersions: number;
  currentBytes: number;
}

export interface ArchiveStore {
  readonly outputDir: string;
  readCurrent(entryId: string): Promise<CurrentRecord | undefined>;
  listCurrent(): Promise<CurrentRecord[]>;
  listHistory(entryId: string): Promise<HistoricalVersion[]>;
  currentFileExists(record: CurrentRecord): Promise<boolean>;
  promote(request: PromoteRequest): Promise<PromoteResult>;
  createStagingPath(entryId: string): string;
  discardStaged(stagedPath: string): Promise<void>;
  sweepStaging(olderThanMs: number): Promise<number>;
  getStats(): Promise<ArchiveStats>;
  close(): Promise<void>;
}
