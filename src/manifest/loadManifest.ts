import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { ManifestError } from "../errors";
import { Entry } from "../types";
import { NamingMode } from "../config";
import { DEFAULT_CATEGORY, Manifest, ManifestCategory, ManifestVersion, SUPPORTED_MANIFEST_VERSIONS } from "./types";

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSupportedVersion(value: unknown): value is ManifestVersion {
  return SUPPORTED_MANIFEST_VERSIONS.some((version) => version === value);
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

function optionalString(raw: RawObject, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ManifestError(`${where}.${key} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseEntry(raw: unknown, where: string, baseUrl: string | undefined): Entry {
  let id: string | undefined;
  let url: string | undefined;
  let title: string | undefined;

  if (typeof raw === "string" || typeof raw === "number") {
    id = String(raw).trim();
  } else if (isObject(raw)) {
    const rawId = raw.id ?? raw.item;
    if (typeof rawId === "string" || typeof rawId === "number") {
      id = String(rawId).trim();
    }
    url = optionalString(raw, "url", where);
    title = optionalString(raw, "title", where);
  } else {
    throw new ManifestError(`${where} must be a string or an object`);
  }

  if (!id) {
    throw new ManifestError(`${where} is missing an id`);
  }

  if (!url) {
    if (!baseUrl) {
      throw new ManifestError(`${where} (${id}) has no url and the manifest has no base_url`);
    }
    url = `${baseUrl}${encodeURIComponent(id)}`;
  }

  if (!isHttpUrl(url)) {
    throw new ManifestError(`${where} (${id}) has an invalid url: ${url}`);
  }

  return title ? { id, url, title } : { id, url };
}

function parseEntries(rawEntries: unknown[], where: string, baseUrl: string | undefined, scope: string): Entry[] {
  const entries: Entry[] = [];
  const seen = new Set<string>();
  rawEntries.forEach((raw: unknown, index) => {
    const entry = parseEntry(raw, `${where}[${index}]`, baseUrl);
    if (seen.has(entry.id)) {
      throw new ManifestError(`duplicate entry id${scope}: ${entry.id}`);
    }
    seen.add(entry.id);
    entries.push(entry);
  });
  return entries;
}

function parseBaseUrl(raw: RawObject, where: string): string | undefined {
  const baseUrl = optionalString(raw, "base_url", where) ?? optionalString(raw, "baseUrl", where);
  if (baseUrl && !isHttpUrl(baseUrl)) {
    throw new ManifestError(`base_url is not an http(s) url: ${baseUrl}`);
  }
  return baseUrl;
}

function toCategoryNamingMode(value: unknown): NamingMode | undefined {
  if (value === "item" || value === "by-item") {
    return "by-item";
  }
  if (value === "title" || value === "by-title") {
    return "by-title";
  }
  return undefined;
}

function parseCategory(name: string, settings: unknown): ManifestCategory {
  if (!isObject(settings)) {
    throw new ManifestError(`category '${name}' must be a mapping`);
  }

  const folder = settings.folder;
  if (typeof folder !== "string" || folder.trim().length === 0) {
    throw new ManifestError(`category '${name}' is missing a valid 'folder' string`);
  }

  let namingMode: NamingMode | undefined;
  const rawMode = settings.filename_mode;
  if (rawMode !== undefined && rawMode !== null) {
    namingMode = toCategoryNamingMode(rawMode);
    if (!namingMode) {
      throw new ManifestError(`category '${name}' has invalid 'filename_mode': ${String(rawMode)} (expected item or title)`);
    }
  }

  const rawItems = settings.items ?? settings.entries;
  if (!Array.isArray(rawItems) || rawItems.length === 0) {
    throw new ManifestError(`category '${name}' must have a non-empty list under 'items'`);
  }

  const baseUrl = parseBaseUrl(settings, `downloads.${name}`);
  const entries = parseEntries(rawItems, `downloads.${name}.items`, baseUrl, ` in category '${name}'`);
  return { name, folder: folder.trim(), baseUrl, namingMode, entries };
}

function parseCategories(downloads: unknown): ManifestCategory[] {
  if (!isObject(downloads)) {
    throw new ManifestError("'downloads' must be a mapping of categories");
  }

  const categories = Object.entries(downloads).map(([name, settings]) => parseCategory(name, settings));
  if (categories.length === 0) {
    throw new ManifestError("'downloads' must contain at least one category");
  }

  const folders = new Map<string, string>();
  for (const category of categories) {
    const key = path.resolve(path.sep, category.folder ?? ".");
    const other = folders.get(key);
    if (other !== undefined) {
      throw new ManifestError(`categories '${other}' and '${category.name}' share folder '${category.folder ?? "."}'`);
    }
    folders.set(key, category.name);
  }
  return categories;
}

/**
 * Validates a parsed document. Fails closed on anything it does not recognise
 * as version 1. A flat `entries` list becomes one category archived in the
 * output directory; a `downloads` mapping gives one category per key, each
 * with its own folder, base url and naming mode.
 */
export function parseManifest(document: unknown, manifestPath?: string): Manifest {
  try {
    if (!isObject(document)) {
      throw new ManifestError("top-level structure must be a mapping");
    }

    if (!("version" in document)) {
      throw new ManifestError("missing 'version' field");
    }
    const version = document.version;
    if (!isSupportedVersion(version)) {
      throw new ManifestError(`unsupported manifest version: ${String(version)}`);
    }

    if ("downloads" in document) {
      if ("entries" in document) {
        throw new ManifestError("manifest must have either 'entries' or 'downloads', not both");
      }
      return { version, categories: parseCategories(document.downloads) };
    }

    const baseUrl = parseBaseUrl(document, "manifest");
    const rawEntries = document.entries;
    if (!Array.isArray(rawEntries) || rawEntries.length === 0) {
      throw new ManifestError("'entries' must be a non-empty list");
    }

    const entries = parseEntries(rawEntries, "entries", baseUrl, "");
    return { version, categories: [{ name: DEFAULT_CATEGORY, baseUrl, entries }] };
  } catch (error) {
    if (error instanceof ManifestError && manifestPath) {
      throw new ManifestError(error.message, manifestPath);
    }
    throw error;
  }
}

export function parseManifestText(text: string, format: "json" | "yaml", manifestPath?: string): Manifest {
  let document: unknown;
  try {
    document = format === "json" ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new ManifestError(
      `could not parse ${format}: ${error instanceof Error ? error.message : String(error)}`,
      manifestPath,
    );
  }
  return parseManifest(document, manifestPath);
}

export function loadManifest(manifestPath: string): Manifest {
  const absolutePath = path.resolve(manifestPath);
  let text: string;
  try {
    text = fs.readFileSync(absolutePath, "utf-8");
  } catch (error) {
    throw new ManifestError(
      `could not read manifest: ${error instanceof Error ? error.message : String(error)}`,
      absolutePath,
    );
  }

  const format = path.extname(absolutePath).toLowerCase() === ".json" ? "json" : "yaml";
  return parseManifestText(text, format, absolutePath);
}
