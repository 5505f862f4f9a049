import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { makeTempDir } from "../testing/stubRemote";
import { applyOverrides, DEFAULT_CONFIG, loadConfig } from "./loadConfig";

describe("loadConfig", () => {
  it("returns defaults when nothing is set", () => {
    expect(loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
  });

  it("layers file values under environment values", () => {
    const dir = makeTempDir();
    const configPath = path.join(dir, "config.json");
    fs.writeFileSync(
      configPath,
      JSON.stringify({ concurrency: 8, namingMode: "by-title", outputDir: "/srv/pdfs", requirePdf: "nope" }),
    );

    const config = loadConfig(configPath, { CONCURRENCY: "2", SINK_TYPE: "NONE", GENERATE_INDEX_HTML: "yes" });

    expect(config.concurrency).toBe(2);
    expect(config.namingMode).toBe("by-title");
    expect(config.outputDir).toBe("/srv/pdfs");
    expect(config.requirePdf).toBe(true);
    expect(config.sinkType).toBe("none");
    expect(config.generateIndexHtml).toBe(true);
  });

  it("ignores unparseable environment values and clamps counts", () => {
    const config = loadConfig(undefined, {
      DOWNLOAD_TIMEOUT_MS: "soon",
      CONCURRENCY: "0",
      NAMING_MODE: "by-color",
      IGNORE_HTTPS_ERRORS: "maybe",
    });

    expect(config.downloadTimeoutMs).toBe(120_000);
    expect(config.concurrency).toBe(1);
    expect(config.namingMode).toBe("by-item");
    expect(config.ignoreHttpsErrors).toBe(false);
  });

  it("truncates fractional counts from the config file", () => {
    const configPath = path.join(makeTempDir(), "config.json");
    fs.writeFileSync(configPath, JSON.stringify({ concurrency: 2.5, maxDownloadAttempts: 0.4, downloadTimeoutMs: 1500.7 }));

    const config = loadConfig(configPath, {});

    expect(config.concurrency).toBe(2);
    expect(config.maxDownloadAttempts).toBe(1);
    expect(config.downloadTimeoutMs).toBe(1500);
  });

  it("fails on a missing config file", () => {
    const missing = path.join(makeTempDir(), "missing.json");

    expect(() => loadConfig(missing, {})).toThrow(`Config file not found: ${missing}`);
  });

  it("requires a JSON object", () => {
    const configPath = path.join(makeTempDir(), "config.json");
    fs.writeFileSync(configPath, "[1, 2]");

    expect(() => loadConfig(configPath, {})).toThrow(`Config file must contain a JSON object: ${configPath}`);
  });
});

describe("applyOverrides", () => {
  it("keeps base values for unset overrides", () => {
    const config = applyOverrides(DEFAULT_CONFIG, { concurrency: 9, outputDir: undefined });

    expect(config).toEqual({ ...DEFAULT_CONFIG, concurrency: 9 });
  });
});
