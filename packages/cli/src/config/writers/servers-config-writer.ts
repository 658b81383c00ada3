// pattern: Imperative Shell

import { type JsonMap, stringify as stringifyToml } from "@iarna/toml";
import { writeFile } from "fs/promises";
import { stringify } from "yaml";

import { ConfigurationError } from "../../utils/errors.js";
import {
  type ConfigDocument,
  type ConfigFormat,
  formatFromPath,
} from "../types/index.js";

type TomlValue = JsonMap[string];

function isTomlValue(value: unknown): value is TomlValue {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isTomlValue);
  }
  return isJsonMap(value);
}

function isJsonMap(value: unknown): value is JsonMap {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(isTomlValue)
  );
}

/**
 * Serializes a configuration document:
 * - json: 2-space indentation with a trailing newline
 * - yaml: yaml library defaults
 * - toml: @iarna/toml (which cannot represent null values)
 */
export function serializeConfigDocument(
  document: ConfigDocument,
  format: ConfigFormat
): string {
  switch (format) {
    case "json":
      return `${JSON.stringify(document, null, 2)}\n`;
    case "yaml":
      return stringify(document);
    case "toml":
      if (!isJsonMap(document)) {
        throw new ConfigurationError(
          "Configuration contains values TOML cannot represent (null or undefined)"
        );
      }
      return stringifyToml(document);
  }
}

/**
 * Writes a configuration document in the format implied by the file
 * extension (.json, .yaml/.yml, .toml; anything else is written as JSON)
 */
export async function writeServersConfig(
  filePath: string,
  document: ConfigDocument
): Promise<void> {
  const content = serializeConfigDocument(document, formatFromPath(filePath));
  await writeFile(filePath, content, "utf8");
}
