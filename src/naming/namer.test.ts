import { describe, expect, it, vi } from "vitest";
import { createSilentLogger } from "../observability";
import { destinationKey, fileNameForItem, resolveFileName, sanitizeFileStem } from "./namer";

const logger = createSilentLogger();

describe("sanitizeFileStem", () => {
  it("removes characters that are not allowed in file names", () => {
    expect(sanitizeFileStem('Annual: Report? <2023> "final" a/b\\c|d*')).toBe("Annual Report 2023 final abcd");
  });

  it("collapses whitespace and strips leading dots", () => {
    expect(sanitizeFileStem("  ..hidden\n\ttitle  ")).toBe("hidden title");
  });

  it("caps the stem length", () => {
    expect(sanitizeFileStem("x".repeat(400))).toHaveLength(180);
  });
});

describe("fileNameForItem", () => {
  it("uses the identifier as the stem", () => {
    expect(fileNameForItem({ id: "ABC123", url: "https://example.test/a" })).toBe("ABC123.pdf");
  });

  it("falls back to a hashed stem when nothing printable is left", () => {
    expect(fileNameForItem({ id: "???", url: "https://example.test/a" })).toMatch(/^entry-[0-9a-f]{12}\.pdf$/);
  });
});

describe("destinationKey", () => {
  it("ignores case", () => {
    expect(destinationKey("Report.pdf")).toBe(destinationKey("REPORT.PDF"));
  });
});

describe("resolveFileName", () => {
  const entry = { id: "A-1", url: "https://example.test/A-1" };

  it("never reads the file in by-item mode", async () => {
    const readTitle = vi.fn(async () => "Ignored");

    const resolved = await resolveFileName({ mode: "by-item", readTitle, logger }, entry, "/tmp/staged.part");

    expect(resolved).toEqual({ fileName: "A-1.pdf", source: "item" });
    expect(readTitle).not.toHaveBeenCalled();
  });

  it("prefers a manifest title over document metadata", async () => {
    const readTitle = vi.fn(async () => "Metadata Title");

    const resolved = await resolveFileName(
      { mode: "by-title", readTitle, logger },
      { ...entry, title: "Manifest: Title" },
      "/tmp/staged.part",
    );

    expect(resolved).toEqual({ fileName: "Manifest Title.pdf", source: "override" });
    expect(readTitle).not.toHaveBeenCalled();
  });

  it("uses the document title when there is no override", async () => {
    const resolved = await resolveFileName(
      { mode: "by-title", readTitle: async () => "Budget / Summary", logger },
      entry,
      "/tmp/staged.part",
    );

    expect(resolved).toEqual({ fileName: "Budget Summary.pdf", source: "metadata" });
  });

  it("falls back to the identifier when the title is missing or unreadable", async () => {
    const missing = await resolveFileName({ mode: "by-title", readTitle: async () => undefined, logger }, entry, "/tmp/a");
    const broken = await resolveFileName(
      {
        mode: "by-title",
        readTitle: async () => {
          throw new Error("bad xref table");
        },
        logger,
      },
      entry,
      "/tmp/b",
    );

    expect(missing).toEqual({ fileName: "A-1.pdf", source: "fallback" });
    expect(broken).toEqual({ fileName: "A-1.pdf", source: "fallback" });
  });
});
