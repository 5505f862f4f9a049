import path from "node:path";
import { AppConfig } from "../config";
import { ArchiveStore } from "./types";
import { SqliteArchiveStore } from "./sqliteArchiveStore";

export function createArchiveStore(config: AppConfig, outputDir = config.outputDir): ArchiveStore {
  return new SqliteArchiveStore({
    outputDir: path.resolve(outputDir),
    historyDirName: config.historyDirName,
    stagingDirName: config.stagingDirName,
    indexFileName: config.indexFileName,
  });
}

export { SqliteArchiveStore } from "./sqliteArchiveStore";
export * from "./fileHash";
export * from "./types";
