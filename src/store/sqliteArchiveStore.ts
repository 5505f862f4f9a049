import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { ArchiveCorruptionError, IOError, NamingConflictError } from "../errors";
import { destinationKey } from "../naming/namer";
import { sha256File } from "./fileHash";
import {
  ArchiveStats,
  ArchiveStore,
  CurrentRecord,
  HistoricalVersion,
  PromoteRequest,
  PromoteResult,
} from "./types";

const SCHEMA_VERSION = 1;

type CurrentRow = {
  entryId: string;
  url: string;
  sha256: string;
  fileName: string;
  bytes: number;
  updatedAt: string;
};

type HistoryRow = {
  entryId: string;
  sha256: string;
  fileName: string;
  bytes: number;
  archivedAt: string;
};

export interface SqliteArchiveStoreOptions {
  outputDir: string;
  historyDirName?: string;
  stagingDirName?: string;
  indexFileName?: string;
  now?: () => Date;
}

function hasStringFields(row: object, keys: string[]): boolean {
  const values = new Map(Object.entries(row));
  return keys.every((key) => typeof values.get(key) === "string");
}

function isCurrentRow(row: unknown): row is CurrentRow {
  return (
    typeof row === "object" &&
    row !== null &&
    hasStringFields(row, ["entryId", "url", "sha256", "fileName", "updatedAt"]) &&
    "bytes" in row &&
    typeof row.bytes === "number"
  );
}

function isHistoryRow(row: unknown): row is HistoryRow {
  return (
    typeof row === "object" &&
    row !== null &&
    hasStringFields(row, ["entryId", "sha256", "fileName", "archivedAt"]) &&
    "bytes" in row &&
    typeof row.bytes === "number"
  );
}

function formatArchiveTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function safeStagingStem(entryId: string): string {
  const stem = entryId.replace(/[^A-Za-z0-9._-]+/g, "_").slice(0, 64);
  return stem.length > 0 ? stem : "entry";
}

/**
 * Archive of current and superseded files, indexed by a SQLite database that
 * lives next to the files. File moves rely on rename/link so that a crash
 * never leaves a half-written current file.
 */
export class SqliteArchiveStore implements ArchiveStore {
  readonly outputDir: string;
  private readonly historyDir: string;
  private readonly stagingDir: string;
  private readonly historyDirName: string;
  private readonly now: () => Date;
  private readonly db: Database.Database;

  constructor(options: SqliteArchiveStoreOptions) {
    this.outputDir = path.resolve(options.outputDir);
    this.historyDirName = options.historyDirName ?? "history";
    this.historyDir = path.join(this.outputDir, this.historyDirName);
    this.stagingDir = path.join(this.outputDir, options.stagingDirName ?? ".staging");
    this.now = options.now ?? (() => new Date());

    fs.mkdirSync(this.historyDir, { recursive: true });
    fs.mkdirSync(this.stagingDir, { recursive: true });

    const indexPath = path.join(this.outputDir, options.indexFileName ?? ".archive-index.sqlite");
    this.db = openIndex(indexPath);
  }

  async readCurrent(entryId: string): Promise<CurrentRecord | undefined> {
    const row: unknown = this.query(() =>
      this.db
        .prepare(
          `
          SELECT entryId, url, sha256, fileName, bytes, updatedAt
          FROM current_records
          WHERE entryId = ?
        `,
        )
        .get(entryId),
    );

    if (row === undefined) {
      return undefined;
    }
    return this.toCurrentRecord(row);
  }

  async listCurrent(): Promise<CurrentRecord[]> {
    const rows: unknown[] = this.query(() =>
      this.db
        .prepare(
          `
          SELECT entryId, url, sha256, fileName, bytes, updatedAt
          FROM current_records
          ORDER BY entryId ASC
        `,
        )
        .all(),
    );

    return rows.map((row) => this.toCurrentRecord(row));
  }

  async listHistory(entryId: string): Promise<HistoricalVersion[]> {
    const rows: unknown[] = this.query(() =>
      this.db
        .prepare(
          `
          SELECT entryId, sha256, fileName, bytes, archivedAt
          FROM history
          WHERE entryId = ?
          ORDER BY seq DESC
        `,
        )
        .all(entryId),
    );

    return rows.map((row) => {
      if (!isHistoryRow(row)) {
        throw new ArchiveCorruptionError(`malformed history row for ${entryId}`);
      }
      return {
        entryId: row.entryId,
        sha256: row.sha256,
        fileName: row.fileName,
        path: path.join(this.outputDir, row.fileName),
        bytes: row.bytes,
        archivedAt: row.archivedAt,
      };
    });
  }

  async currentFileExists(record: CurrentRecord): Promise<boolean> {
    try {
      const stat = await fs.promises.stat(record.path);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async promote(request: PromoteRequest): Promise<PromoteResult> {
    const destination = path.join(this.outputDir, request.fileName);
    if (path.dirname(destination) !== this.outputDir) {
      throw new IOError(`destination ${request.fileName} escapes the output directory`);
    }

    const owner = this.findOwner(request.fileName, request.entryId);
    if (owner) {
      throw new NamingConflictError(request.fileName, [owner, request.entryId].sort());
    }

    const current = await this.readCurrent(request.entryId);
    const renamed = !current || destinationKey(current.fileName) !== destinationKey(request.fileName);
    const archivedAt = this.now();
    let archived: HistoricalVersion | undefined;
    let adopted: HistoricalVersion | undefined;

    // Outgoing files are linked into history before the staged file replaces
    // them, so the prior version exists on disk at every step. History rows
    // carry the fingerprint of the bytes actually on disk.
    try {
      if (current && (await this.currentFileExists(current))) {
        archived = await this.archiveIfDifferent(current.path, current.fileName, request, archivedAt);
      }
      if (renamed) {
        adopted = await this.archiveIfDifferent(destination, request.fileName, request, archivedAt);
      }
      await fs.promises.rename(request.stagedPath, destination);
    } catch (error) {
      for (const version of [archived, adopted]) {
        if (version) {
          await fs.promises.rm(version.path, { force: true });
        }
      }
      if (error instanceof IOError) {
        throw error;
      }
      throw new IOError(
        `could not move ${request.stagedPath} to ${destination}: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }

    const record: CurrentRecord = {
      entryId: request.entryId,
      url: request.url,
      sha256: request.sha256,
      fileName: request.fileName,
      path: destination,
      bytes: request.bytes,
      updatedAt: archivedAt.toISOString(),
    };
    this.commitPromotion(record, [adopted, archived]);

    if (current && renamed) {
      await fs.promises.rm(current.path, { force: true });
    }

    return { record, archived, adopted };
  }

  createStagingPath(entryId: string): string {
    const suffix = crypto.randomBytes(4).toString("hex");
    return path.join(this.stagingDir, `${safeStagingStem(entryId)}-${suffix}.part`);
  }

  async discardStaged(stagedPath: string): Promise<void> {
    await fs.promises.rm(stagedPath, { force: true });
  }

  async sweepStaging(olderThanMs: number): Promise<number> {
    const names = await fs.promises.readdir(this.stagingDir);
    const cutoff = this.now().getTime() - olderThanMs;
    let removed = 0;
    for (const name of names) {
      if (!name.endsWith(".part")) {
        continue;
      }
      const filePath = path.join(this.stagingDir, name);
      const stat = await fs.promises.stat(filePath);
      if (stat.mtimeMs <= cutoff) {
        await fs.promises.rm(filePath, { force: true });
        removed += 1;
      }
    }
    return removed;
  }

  async getStats(): Promise<ArchiveStats> {
    return this.query(() => {
      const tracked: unknown = this.db.prepare("SELECT COUNT(*) AS count, COALESCE(SUM(bytes), 0) AS bytes FROM current_records").get();
      const history: unknown = this.db.prepare("SELECT COUNT(*) AS count FROM history").get();
      return {
        trackedEntries: readCount(tracked, "count"),
        historyVersions: readCount(history, "count"),
        currentBytes: readCount(tracked, "bytes"),
      };
    });
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private findOwner(fileName: string, entryId: string): string | undefined {
    const rows: unknown[] = this.query(() =>
      this.db.prepare("SELECT entryId, fileName FROM current_records WHERE entryId != ?").all(entryId),
    );
    const key = destinationKey(fileName);
    for (const row of rows) {
      if (typeof row !== "object" || row === null) {
        continue;
      }
      const values = new Map(Object.entries(row));
      const owner = values.get("entryId");
      const ownedName = values.get("fileName");
      if (typeof owner === "string" && typeof ownedName === "string" && destinationKey(ownedName) === key) {
        return owner;
      }
    }
    return undefined;
  }

  /** Links `sourcePath` into history unless it already holds the incoming bytes. */
  private async archiveIfDifferent(
    sourcePath: string,
    sourceFileName: string,
    request: PromoteRequest,
    archivedAt: Date,
  ): Promise<HistoricalVersion | undefined> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(sourcePath);
    } catch {
      return undefined;
    }
    if (!stat.isFile()) {
      throw new IOError(`destination ${sourcePath} exists and is not a file`);
    }

    const existingSha = await sha256File(sourcePath);
    if (existingSha === request.sha256) {
      return undefined;
    }
    return this.linkIntoHistory(sourcePath, sourceFileName, archivedAt, {
      entryId: request.entryId,
      sha256: existingSha,
      bytes: stat.size,
    });
  }

  private async linkIntoHistory(
    sourcePath: string,
    sourceFileName: string,
    archivedAt: Date,
    identity: { entryId: string; sha256: string; bytes: number },
  ): Promise<HistoricalVersion> {
    const extension = path.extname(sourceFileName) || ".pdf";
    const stem = path.basename(sourceFileName, extension);
    const base = `${stem}_${formatArchiveTimestamp(archivedAt)}`;

    for (let suffix = 1; ; suffix += 1) {
      const name = suffix === 1 ? `${base}${extension}` : `${base}_${suffix}${extension}`;
      const target = path.join(this.historyDir, name);
      try {
        await fs.promises.link(sourcePath, target);
      } catch (error) {
        if (isErrnoException(error) && error.code === "EEXIST") {
          continue;
        }
        if (isErrnoException(error) && (error.code === "EPERM" || error.code === "EXDEV" || error.code === "ENOTSUP")) {
          try {
            await fs.promises.copyFile(sourcePath, target, fs.constants.COPYFILE_EXCL);
          } catch (copyError) {
            if (isErrnoException(copyError) && copyError.code === "EEXIST") {
              continue;
            }
            throw new IOError(`could not archive ${sourcePath}: ${String(copyError)}`, copyError);
          }
        } else {
          throw new IOError(`could not archive ${sourcePath}: ${String(error)}`, error);
        }
      }

      return {
        entryId: identity.entryId,
        sha256: identity.sha256,
        fileName: path.posix.join(this.historyDirName, name),
        path: target,
        bytes: identity.bytes,
        archivedAt: archivedAt.toISOString(),
      };
    }
  }

  private commitPromotion(record: CurrentRecord, versions: Array<HistoricalVersion | undefined>): void {
    const insertHistory = this.db.prepare(`
      INSERT INTO history (entryId, sha256, fileName, bytes, archivedAt)
      VALUES (@entryId, @sha256, @fileName, @bytes, @archivedAt)
    `);
    const upsertCurrent = this.db.prepare(`
      INSERT INTO current_records (entryId, url, sha256, fileName, bytes, updatedAt)
      VALUES (@entryId, @url, @sha256, @fileName, @bytes, @updatedAt)
      ON CONFLICT(entryId) DO UPDATE SET
        url = excluded.url,
        sha256 = excluded.sha256,
        fileName = excluded.fileName,
        bytes = excluded.bytes,
        updatedAt = excluded.updatedAt
    `);

    const tx = this.db.transaction(() => {
      for (const version of versions) {
        if (!version) {
          continue;
        }
        insertHistory.run({
          entryId: version.entryId,
          sha256: version.sha256,
          fileName: version.fileName,
          bytes: version.bytes,
          archivedAt: version.archivedAt,
        });
      }
      upsertCurrent.run({
        entryId: record.entryId,
        url: record.url,
        sha256: record.sha256,
        fileName: record.fileName,
        bytes: record.bytes,
        updatedAt: record.updatedAt,
      });
    });
    tx();
  }

  private toCurrentRecord(row: unknown): CurrentRecord {
    if (!isCurrentRow(row)) {
      throw new ArchiveCorruptionError("malformed current record in archive index");
    }
    return {
      entryId: row.entryId,
      url: row.url,
      sha256: row.sha256,
      fileName: row.fileName,
      path: path.join(this.outputDir, row.fileName),
      bytes: row.bytes,
      updatedAt: row.updatedAt,
    };
  }

  private query<T>(run: () => T): T {
    try {
      return run();
    } catch (error) {
      if (error instanceof Database.SqliteError) {
        throw new ArchiveCorruptionError(`archive index query failed: ${error.message}`, error);
      }
      throw error;
    }
  }
}

function openIndex(indexPath: string): Database.Database {
  let db: Database.Database | undefined;
  try {
    db = new Database(indexPath);
    db.pragma("journal_mode = WAL");
    initializeSchema(db);
    return db;
  } catch (error) {
    db?.close();
    if (error instanceof ArchiveCorruptionError) {
      throw error;
    }
    throw new ArchiveCorruptionError(
      `archive index ${indexPath} is unreadable: ${error instanceof Error ? error.message : String(error)}`,
      error,
    );
  }
}

function initializeSchema(db: Database.Database): void {
  const version: unknown = db.pragma("user_version", { simple: true });
  if (typeof version === "number" && version > SCHEMA_VERSION) {
    throw new ArchiveCorruptionError(`archive index schema ${version} is newer than supported ${SCHEMA_VERSION}`);
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS current_records (
      entryId TEXT PRIMARY KEY,
      url TEXT NOT NULL,
      sha256 TEXT NOT NULL,
      fileName TEXT NOT NULL,
      bytes INTEGER NOT NULL,
      updatedAt TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS history (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      entryId TEXT NOT NULL,
      sha256 TEXT NOT NULL,
      fileName TEXT NOT NULL,
      bytes INTEGER NOT NULL,
      archivedAt TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_history_entry ON history(entryId, seq);
  `);

  if (version !== SCHEMA_VERSION) {
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  }
}

function readCount(row: unknown, key: string): number {
  if (typeof row !== "object" || row === null) {
    return 0;
  }
  const value = new Map(Object.entries(row)).get(key);
  return typeof value === "number" ? value : 0;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
