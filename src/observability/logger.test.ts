import { describe, expect, it } from "vitest";
import { Logger, parseLogLevel } from "./logger";
import { createRunId } from "./runId";

describe("Logger", () => {
  it("writes one JSON object per line with the run context", () => {
    const lines: string[] = [];
    const logger = new Logger({ component: "cli", runId: "run_x" }, { minLevel: "debug", write: (_level, line) => lines.push(line) });

    logger.child("sync").warn("entry_failed", { entryId: "A", attempt: 2 });

    expect(lines).toHaveLength(1);
    const payload = JSON.parse(lines[0]);
    expect(payload).toMatchObject({ level: "warn", msg: "entry_failed", component: "sync", runId: "run_x", entryId: "A", attempt: 2 });
    expect(typeof payload.ts).toBe("string");
  });

  it("filters below the minimum level", () => {
    const levels: string[] = [];
    const logger = new Logger({ component: "cli", runId: "run_x" }, { minLevel: "warn", write: (level) => levels.push(level) });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(levels).toEqual(["warn", "error"]);
  });

  it("parses level names case-insensitively", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("verbose")).toBeUndefined();
  });
});

describe("createRunId", () => {
  it("embeds the timestamp and a random suffix", () => {
    expect(createRunId(new Date("2024-05-06T07:08:09.123Z"), () => 0.5)).toBe("run_2024-05-06T07-08-09-123Z_i");
  });
});
