import { EntryOutcome } from "../types";

export interface Sink {
  publishOutcomes(outcomes: EntryOutcome[]): Promise<void>;
}
