import { FailureKind } from "../errors";

export interface Entry {
  readonly id: string;
  readonly url: string;
  readonly title?: string;
}

export interface FetchResult {
  entryId: string;
  url: string;
  resolvedUrl?: string;
  stagedPath: string;
  sha256: string;
  bytes: number;
  contentType?: string;
  attempt: number;
  fetchedAt: string;
}

export type OutcomeStatus = "unchanged" | "updated" | "failed";

export interface EntryOutcome {
  entryId: string;
  url: string;
  status: OutcomeStatus;
  path?: string;
  sha256?: string;
  bytes: number;
  error?: {
    kind: FailureKind;
    message: string;
  };
  finishedAt: string;
}

export interface RunSummary {
  runId: string;
  total: number;
  unchanged: number;
  updated: number;
  failed: number;
  failures: Array<{ entryId: string; kind: FailureKind; message: string }>;
  outcomes: EntryOutcome[];
}
