// pattern: Functional Core

import { UnmappedCommandWarning } from "../../utils/errors.js";
import { isFlag, isScoped } from "../package-name.js";

import type { ServerEntry } from "../../config/types/index.js";
import type { Ecosystem, PackageOutcome, PackageStrategy } from "../types.js";

export const PYTHON_MODULE_FLAG = "-m";

/**
 * npx: a scoped token anywhere, or an unscoped non-flag token at any index
 * but the first.
 */
export function extractNpxPackage(args: readonly string[]): string | null {
  for (const [index, arg] of args.entries()) {
    if (isFlag(arg)) continue;
    if (isScoped(arg) || index > 0) return arg;
  }
  return null;
}

/**
 * uvx: the first non-flag token
 */
export function extractUvxPackage(args: readonly string[]): string | null {
  return args.find(arg => !isFlag(arg)) ?? null;
}

/**
 * python: `-m <module>` as the first two args
 */
export function extractPythonModule(args: readonly string[]): string | null {
  const [flag, module] = args;
  return flag === PYTHON_MODULE_FLAG && module !== undefined ? module : null;
}

interface ArgumentPattern {
  ecosystem: Ecosystem;
  extract: (args: readonly string[]) => string | null;
}

const ARGUMENT_PATTERNS: Readonly<Record<string, ArgumentPattern>> = {
  npx: { ecosystem: "npm", extract: extractNpxPackage },
  uvx: { ecosystem: "uv", extract: extractUvxPackage },
  python: { ecosystem: "pip", extract: extractPythonModule },
};

/**
 * Reads the package out of the args of npx, uvx and `python -m` entries.
 * Every other command is assumed pre-installed.
 */
export class ArgumentPatternStrategy implements PackageStrategy {
  readonly name = "args";

  extract(entry: ServerEntry): PackageOutcome {
    const pattern = Object.hasOwn(ARGUMENT_PATTERNS, entry.command)
      ? ARGUMENT_PATTERNS[entry.command]
      : undefined;

    if (!pattern || entry.args.length === 0) {
      return {
        kind: "skipped",
        warning: new UnmappedCommandWarning(entry.name, entry.command),
      };
    }

    const identifier = pattern.extract(entry.args);
    if (identifier === null) {
      return {
        kind: "skipped",
        warning: new UnmappedCommandWarning(
          entry.name,
          entry.command,
          `No package found in ${entry.command} args for ${entry.name}: ${entry.args.join(" ")}`
        ),
      };
    }

    return {
      kind: "package",
      reference: { ecosystem: pattern.ecosystem, identifier },
    };
  }
}
