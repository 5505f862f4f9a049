import { Logger } from "./logger";

export type ProgressEvent =
  | {
      kind: "transfer";
      entryId: string;
      bytes: number;
    }
  | {
      kind: "complete";
      entryId: string;
      status: "unchanged" | "updated" | "failed";
      bytes: number;
      error?: string;
    };

/**
 * Bounded single-consumer queue. Producers call `tryPush`, which never waits:
 * when the buffer is full the event is dropped and counted.
 */
export class ProgressChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly capacity: number;
  private waiting: ((result: IteratorResult<T>) => void) | undefined;
  private closed = false;
  private droppedCount = 0;

  constructor(capacity: number) {
    this.capacity = Math.max(1, capacity);
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get size(): number {
    return this.buffer.length;
  }

  tryPush(event: T): boolean {
    if (this.closed) {
      this.droppedCount += 1;
      return false;
    }

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve({ value: event, done: false });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      this.droppedCount += 1;
      return false;
    }

    this.buffer.push(event);
    return true;
  }

  close(): void {
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => {
        const next = this.buffer.shift();
        if (next !== undefined) {
          return Promise.resolve({ value: next, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve) => {
          this.waiting = resolve;
        });
      },
    };
  }
}

export interface ProgressReporter {
  onEvent(event: ProgressEvent): void;
  finish(): void;
}

export interface ProgressSnapshot {
  total: number;
  completed: number;
  unchanged: number;
  updated: number;
  failed: number;
  bytes: number;
}

/** Owns the display state; the only reader of the progress channel. */
export class LogProgressReporter implements ProgressReporter {
  private readonly logger: Logger;
  private readonly state: ProgressSnapshot;

  constructor(logger: Logger, total: number) {
    this.logger = logger;
    this.state = { total, completed: 0, unchanged: 0, updated: 0, failed: 0, bytes: 0 };
  }

  snapshot(): ProgressSnapshot {
    return { ...this.state };
  }

  onEvent(event: ProgressEvent): void {
    if (event.kind === "transfer") {
      this.logger.debug("progress_transfer", { entryId: event.entryId, bytes: event.bytes });
      return;
    }

    this.state.completed += 1;
    this.state.bytes += event.bytes;
    this.state[event.status] += 1;
    this.logger.info("progress", {
      entryId: event.entryId,
      status: event.status,
      completed: this.state.completed,
      total: this.state.total,
      percent: this.state.total === 0 ? 100 : Math.round((this.state.completed / this.state.total) * 100),
      error: event.error,
    });
  }

  finish(): void {
    this.logger.info("progress_done", { ...this.state });
  }
}

export async function consumeProgress(
  channel: AsyncIterable<ProgressEvent>,
  reporter: ProgressReporter,
): Promise<void> {
  for await (const event of channel) {
    reporter.onEvent(event);
  }
  reporter.finish();
}
