import fs from "node:fs";
import path from "node:path";
import { EntryOutcome } from "../types";
import { Sink } from "./types";

/** Append-only ledger of outcomes, one JSON object per line. */
export class LocalJsonlSink implements Sink {
  readonly outcomesPath: string;
  private readonly runId: string;

  constructor(ledgerDir: string, runId: string) {
    this.outcomesPath = path.join(path.resolve(ledgerDir), "outcomes.jsonl");
    this.runId = runId;
  }

  async publishOutcomes(outcomes: EntryOutcome[]): Promise<void> {
    await this.appendLines(
      outcomes.map((outcome) => ({
        runId: this.runId,
        ...outcome,
      })),
    );
  }

  private async appendLines(records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await fs.promises.mkdir(path.dirname(this.outcomesPath), { recursive: true });
    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(this.outcomesPath, content, "utf-8");
  }
}
