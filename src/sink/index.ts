import path from "node:path";
import { AppConfig } from "../config";
import { LocalJsonlSink } from "./localJsonlSink";
import { NoopSink } from "./noopSink";
import { Sink } from "./types";

export const LEDGER_DIR_NAME = ".runs";

export function createSink(config: AppConfig, runId: string, outputDir = config.outputDir): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(path.join(outputDir, LEDGER_DIR_NAME), runId);
    case "none":
      return new NoopSink();
    default:
      throw new Error(`Unsupported sink type: ${String(config.sinkType)}`);
  }
}

export { LocalJsonlSink } from "./localJsonlSink";
export { NoopSink } from "./noopSink";
export * from "./types";
