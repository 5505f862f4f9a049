import { EntryOutcome } from "../types";
import { Sink } from "./types";

export class NoopSink implements Sink {
  async publishOutcomes(_outcomes: EntryOutcome[]): Promise<void> {
    return;
  }
}
