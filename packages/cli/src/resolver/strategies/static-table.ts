// pattern: Mixed (unavoidable)

import { readFile } from "fs/promises";
import { fileURLToPath } from "url";

import { assertInputExists } from "../../config/loaders/servers-config-loader.js";
import { CommandTableV1 } from "../../config/types/index.js";
import { ajv } from "../../utils/ajv.js";
import {
  ParseError,
  SchemaError,
  UnmappedCommandWarning,
} from "../../utils/errors.js";

import type { ServerEntry } from "../../config/types/index.js";
import type {
  PackageOutcome,
  PackageReference,
  PackageStrategy,
} from "../types.js";

export type CommandTable = ReadonlyMap<string, PackageReference>;

export const DEFAULT_COMMAND_TABLE_PATH = fileURLToPath(
  new URL("../../../data/command-packages.json", import.meta.url)
);

const validateCommandTable = ajv.compile<CommandTableV1>(CommandTableV1);

export function parseCommandTable(data: unknown, source: string): CommandTable {
  if (!validateCommandTable(data)) {
    const errors = (validateCommandTable.errors ?? []).map(
      err => `${err.instancePath || "root"}: ${err.message ?? "invalid"}`
    );
    throw new SchemaError(
      `Invalid command table in ${source}: ${errors.join(", ")}`,
      errors
    );
  }
  return new Map(Object.entries(data));
}

/**
 * Loads a JSON command table, the bundled one by default
 */
export async function loadCommandTable(
  filePath: string = DEFAULT_COMMAND_TABLE_PATH
): Promise<CommandTable> {
  await assertInputExists(filePath);
  const content = await readFile(filePath, "utf8");

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Failed to parse ${filePath}: ${reason}`, filePath);
  }

  return parseCommandTable(data, filePath);
}

/**
 * Looks the command up verbatim in a fixed table; args are ignored.
 */
export class StaticTableStrategy implements PackageStrategy {
  readonly name = "table";
  private readonly table: CommandTable;

  constructor(table: CommandTable) {
    this.table = table;
  }

  extract(entry: ServerEntry): PackageOutcome {
    const reference = this.table.get(entry.command);
    if (!reference) {
      return {
        kind: "skipped",
        warning: new UnmappedCommandWarning(entry.name, entry.command),
      };
    }
    return { kind: "package", reference };
  }
}
