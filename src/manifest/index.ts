export * from "./loadManifest";
export * from "./types";
