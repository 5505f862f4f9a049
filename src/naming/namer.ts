import crypto from "node:crypto";
import { NamingMode } from "../config";
import { Logger } from "../observability";
import { Entry } from "../types";
import { PdfTitleReader } from "./pdfTitle";

const MAX_STEM_LENGTH = 180;

export type NameSource = "item" | "override" | "metadata" | "fallback";

export interface ResolvedName {
  fileName: string;
  source: NameSource;
}

export interface NamerDeps {
  mode: NamingMode;
  readTitle: PdfTitleReader;
  logger: Logger;
}

export function sanitizeFileStem(value: string): string {
  return value
    .replace(/[\\/*?:"<>|]/g, "")
    .replace(/[\u0000-\u001f\u007f]/g, "")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^\.+/, "")
    .slice(0, MAX_STEM_LENGTH)
    .trim();
}

function stemForId(id: string): string {
  const stem = sanitizeFileStem(id);
  if (stem.length > 0) {
    return stem;
  }
  return `entry-${crypto.createHash("sha256").update(id).digest("hex").slice(0, 12)}`;
}

export function fileNameForItem(entry: Entry): string {
  return `${stemForId(entry.id)}.pdf`;
}

/** Case-insensitive key used to detect two entries claiming one destination. */
export function destinationKey(fileName: string): string {
  return fileName.normalize("NFC").toLowerCase();
}

export async function resolveFileName(deps: NamerDeps, entry: Entry, stagedPath: string): Promise<ResolvedName> {
  if (deps.mode === "by-item") {
    return { fileName: fileNameForItem(entry), source: "item" };
  }

  if (entry.title) {
    const stem = sanitizeFileStem(entry.title);
    if (stem.length > 0) {
      return { fileName: `${stem}.pdf`, source: "override" };
    }
  }

  let title: string | undefined;
  try {
    title = await deps.readTitle(stagedPath);
  } catch (error) {
    deps.logger.warn("naming_title_unreadable", {
      entryId: entry.id,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const stem = title ? sanitizeFileStem(title) : "";
  if (stem.length > 0) {
    return { fileName: `${stem}.pdf`, source: "metadata" };
  }

  deps.logger.info("naming_title_fallback", { entryId: entry.id });
  return { fileName: fileNameForItem(entry), source: "fallback" };
}
