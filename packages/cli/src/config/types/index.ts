// pattern: Functional Core

import { extname } from "path";

export * from "./v1/index.js";

export type ConfigFormat = "json" | "yaml" | "toml";

/**
 * "strict" rejects a document without `mcpServers`; "permissive" loads it
 * with a null configuration so callers can pass it through unchanged.
 */
export type LoadMode = "strict" | "permissive";

export type ConfigDocument = Record<string, unknown>;

export function isConfigDocument(value: unknown): value is ConfigDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface ServerEntry {
  /** Key of the entry under `mcpServers` */
  readonly name: string;
  readonly command: string;
  /** Empty when the entry declares no args */
  readonly args: readonly string[];
  /** The entry as declared, including fields mcpbake does not interpret */
  readonly raw: ConfigDocument;
}

/**
 * An `mcpServers` value that is not a usable server definition, such as a
 * non-mapping or an entry whose `args` is not a list of strings
 */
export interface SkippedEntry {
  readonly name: string;
  readonly raw: unknown;
  readonly problems: readonly string[];
}

export interface Configuration {
  /** Entries in declaration order */
  readonly servers: readonly ServerEntry[];
  /** Left out of resolution; the rewriter copies them through verbatim */
  readonly skipped: readonly SkippedEntry[];
  /** Every `mcpServers` entry as written, in declaration order */
  readonly declared: ReadonlyArray<readonly [string, unknown]>;
}

export interface LoadedConfig {
  readonly path: string;
  readonly format: ConfigFormat;
  readonly document: ConfigDocument;
  /** null when `mcpServers` is absent and the load was permissive */
  readonly configuration: Configuration | null;
}

/**
 * Config format implied by a file's extension; anything unrecognised is JSON
 */
export function formatFromPath(filePath: string): ConfigFormat {
  switch (extname(filePath).toLowerCase()) {
    case ".yaml":
    case ".yml":
      return "yaml";
    case ".toml":
      return "toml";
    default:
      return "json";
  }
}
