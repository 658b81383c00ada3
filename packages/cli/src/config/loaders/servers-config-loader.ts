// pattern: Imperative Shell
import { parse as parseToml } from "@iarna/toml";
import { access, constants, readFile } from "fs/promises";
import { parse as parseYaml } from "yaml";

import { ajv } from "../../utils/ajv.js";
import {
  InputMissingError,
  ParseError,
  SchemaError,
} from "../../utils/errors.js";
import {
  type ConfigDocument,
  type ConfigFormat,
  type Configuration,
  formatFromPath,
  isConfigDocument,
  type LoadedConfig,
  type LoadMode,
  McpServerEntryV1,
  McpServersDocumentV1,
  type ServerEntry,
  type SkippedEntry,
} from "../types/index.js";

// Compile schemas once for reuse
const validateServersDocument = ajv.compile<McpServersDocumentV1>(
  McpServersDocumentV1
);
const validateServerEntry = ajv.compile<McpServerEntryV1>(McpServerEntryV1);

export interface LoadServersConfigOptions {
  mode: LoadMode;
}

/**
 * Throws InputMissingError unless the file exists
 */
export async function assertInputExists(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.F_OK);
  } catch {
    throw new InputMissingError(filePath);
  }
}

/**
 * Parses raw file content in the given format. Any parser failure becomes a
 * ParseError naming the file.
 */
export function parseConfigContent(
  content: string,
  format: ConfigFormat,
  filePath: string
): unknown {
  try {
    switch (format) {
      case "yaml":
        return parseYaml(content);
      case "toml":
        return parseToml(content);
      case "json":
        return JSON.parse(content);
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Failed to parse ${filePath}: ${reason}`, filePath);
  }
}

/**
 * Builds the Configuration view of an already-parsed document.
 *
 * Returns null for a document without `mcpServers` in permissive mode.
 * Entries are checked one at a time: a missing command reads as "", and an
 * entry that cannot be read as a server lands in `skipped` instead of
 * failing the whole load.
 */
export function extractConfiguration(
  document: ConfigDocument,
  mode: LoadMode,
  filePath: string
): Configuration | null {
  if (!("mcpServers" in document)) {
    if (mode === "strict") {
      throw new SchemaError(
        `${filePath} has no top-level "mcpServers" key`,
        ["root: must have property 'mcpServers'"]
      );
    }
    return null;
  }

  if (!validateServersDocument(document)) {
    const errors = (validateServersDocument.errors ?? []).map(
      err => `${err.instancePath || "root"}: ${err.message ?? "invalid"}`
    );
    throw new SchemaError(
      `Invalid MCP server configuration in ${filePath}: ${errors.join(", ")}`,
      errors
    );
  }

  const declared = Object.entries(document.mcpServers);
  const servers: ServerEntry[] = [];
  const skipped: SkippedEntry[] = [];

  for (const [name, raw] of declared) {
    if (!isConfigDocument(raw)) {
      skipped.push({
        name,
        raw,
        problems: [`/mcpServers/${name}: must be a mapping`],
      });
    } else if (!validateServerEntry(raw)) {
      skipped.push({
        name,
        raw,
        problems: (validateServerEntry.errors ?? []).map(
          err => `/mcpServers/${name}${err.instancePath}: ${err.message ?? "invalid"}`
        ),
      });
    } else {
      servers.push({
        name,
        command: raw.command ?? "",
        args: raw.args ?? [],
        raw,
      });
    }
  }

  return { servers, skipped, declared };
}

/**
 * Loads an MCP server configuration, detecting the format by extension
 * (.json, .yaml/.yml, .toml; anything else is read as JSON)
 */
export async function loadServersConfig(
  filePath: string,
  options: LoadServersConfigOptions
): Promise<LoadedConfig> {
  await assertInputExists(filePath);

  const format = formatFromPath(filePath);
  const content = await readFile(filePath, "utf8");
  const parsed = parseConfigContent(content, format, filePath);

  if (!isConfigDocument(parsed)) {
    throw new SchemaError(`${filePath} must contain a mapping at the top level`, [
      "root: must be object",
    ]);
  }

  return {
    path: filePath,
    format,
    document: parsed,
    configuration: extractConfiguration(parsed, options.mode, filePath),
  };
}
