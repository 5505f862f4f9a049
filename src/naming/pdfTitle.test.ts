import { describe, expect, it, vi } from "vitest";
import { createPdfTitleReader } from "./pdfTitle";

function readerWithInfo(info: unknown, destroy = vi.fn(async () => undefined)) {
  const readFile = vi.fn(async (_path: string) => Buffer.from("%PDF-1.4"));
  const reader = createPdfTitleReader({
    readFile,
    parserFactory: () => ({
      getInfo: async () => ({ info }),
      destroy,
    }),
  });
  return { reader, readFile, destroy };
}

describe("createPdfTitleReader", () => {
  it("returns the trimmed Title entry", async () => {
    const { reader, readFile, destroy } = readerWithInfo({ Title: "  Quarterly Report  ", Author: "Finance" });

    await expect(reader("/tmp/doc.part")).resolves.toBe("Quarterly Report");
    expect(readFile).toHaveBeenCalledWith("/tmp/doc.part");
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it("returns undefined for blank or missing titles", async () => {
    await expect(readerWithInfo({ Title: "   " }).reader("/tmp/a")).resolves.toBeUndefined();
    await expect(readerWithInfo({ Author: "Someone" }).reader("/tmp/b")).resolves.toBeUndefined();
    await expect(readerWithInfo(undefined).reader("/tmp/c")).resolves.toBeUndefined();
  });

  it("releases the parser even when reading fails", async () => {
    const destroy = vi.fn(async () => undefined);
    const reader = createPdfTitleReader({
      readFile: async () => Buffer.from("garbage"),
      parserFactory: () => ({
        getInfo: async () => {
          throw new Error("Invalid PDF structure");
        },
        destroy,
      }),
    });

    await expect(reader("/tmp/bad")).rejects.toThrow("Invalid PDF structure");
    expect(destroy).toHaveBeenCalledTimes(1);
  });
});
