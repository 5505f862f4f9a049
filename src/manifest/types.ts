import { NamingMode } from "../config";
import { Entry } from "../types";

export const SUPPORTED_MANIFEST_VERSIONS = [1] as const;

export type ManifestVersion = (typeof SUPPORTED_MANIFEST_VERSIONS)[number];

/** Name given to the single category of a manifest written with a flat `entries` list. */
export const DEFAULT_CATEGORY = "default";

export interface ManifestCategory {
  name: string;
  /** Archive directory, resolved against the configured output directory. Absent means the output directory itself. */
  folder?: string;
  baseUrl?: string;
  namingMode?: NamingMode;
  entries: Entry[];
}

export interface Manifest {
  version: ManifestVersion;
  categories: ManifestCategory[];
}
