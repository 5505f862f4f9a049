import fs from "node:fs";

interface InfoParserLike {
  getInfo(): Promise<{ info?: unknown }>;
  destroy(): Promise<void>;
}

export interface PdfTitleReaderDeps {
  parserFactory?: (data: Buffer) => InfoParserLike | Promise<InfoParserLike>;
  readFile?: (filePath: string) => Promise<Buffer>;
}

export type PdfTitleReader = (filePath: string) => Promise<string | undefined>;

function titleFromInfo(info: unknown): string | undefined {
  if (typeof info !== "object" || info === null) {
    return undefined;
  }
  const title = new Map(Object.entries(info)).get("Title");
  if (typeof title !== "string") {
    return undefined;
  }
  const trimmed = title.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Reads the document information `Title` of a PDF; undefined when the document has none. */
export function createPdfTitleReader(deps?: PdfTitleReaderDeps): PdfTitleReader {
  const parserFactory: (data: Buffer) => InfoParserLike | Promise<InfoParserLike> =
    deps?.parserFactory ??
    (async (data: Buffer) => {
      // pdf.js is only loaded once a title is actually needed.
      const { PDFParse } = await import("pdf-parse");
      return new PDFParse({
        data,
      });
    });
  const readFile = deps?.readFile ?? fs.promises.readFile;

  return async (filePath) => {
    const data = await readFile(filePath);
    const parser = await parserFactory(data);
    try {
      const result = await parser.getInfo();
      return titleFromInfo(result.info);
    } finally {
      await parser.destroy().catch(() => undefined);
    }
  };
}
