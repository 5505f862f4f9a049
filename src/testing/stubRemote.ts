import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Response } from "undici";
import { DEFAULT_CONFIG, AppConfig } from "../config";
import type { FetchFn } from "../core/fetch";

export type RemoteBehavior =
  | { kind: "ok"; body: Buffer | string; contentType?: string }
  | { kind: "status"; status: number }
  | { kind: "error"; message: string }
  | { kind: "hang" };

/**
 * In-process stand-in for the remote host. Each URL holds a queue of
 * behaviours; the last one repeats once the queue is drained.
 */
export class StubRemote {
  readonly requests: string[] = [];
  private readonly behaviors = new Map<string, RemoteBehavior[]>();

  set(url: string, ...behaviors: RemoteBehavior[]): this {
    this.behaviors.set(url, behaviors);
    return this;
  }

  serve(url: string, body: Buffer | string, contentType = "application/pdf"): this {
    return this.set(url, { kind: "ok", body, contentType });
  }

  countFor(url: string): number {
    return this.requests.filter((request) => request === url).length;
  }

  readonly fetchFn: FetchFn = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    this.requests.push(url);

    const queue = this.behaviors.get(url);
    const behavior = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (!behavior) {
      return new Response("not found", { status: 404 });
    }

    switch (behavior.kind) {
      case "ok":
        return new Response(behavior.body, {
          status: 200,
          headers: { "content-type": behavior.contentType ?? "application/pdf" },
        });
      case "status":
        return new Response(`status ${behavior.status}`, { status: behavior.status });
      case "error":
        throw new TypeError(behavior.message);
      case "hang":
        return new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) {
            return;
          }
          signal.addEventListener("abort", () => reject(signal.reason), { once: true });
        });
    }
  };
}

export function pdfBytes(label: string): Buffer {
  return Buffer.from(`%PDF-1.4\n% ${label}\n%%EOF\n`, "utf-8");
}

export function makeTempDir(prefix = "pdf-archiver-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(outputDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    outputDir,
    concurrency: 3,
    maxDownloadAttempts: 2,
    sinkType: "none",
    ...overrides,
  };
}

export const noSleep = async (_ms: number): Promise<void> => undefined;
