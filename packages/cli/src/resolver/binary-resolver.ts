// pattern: Imperative Shell

import { readFile, stat } from "fs/promises";
import { join } from "path";

import { binaryNameFor, parseBinaryDeclaration } from "./manifest.js";
import { stripVersionSpecifier } from "./package-name.js";

import type { GlobalRootProvider } from "./types.js";
import type { Logger } from "pino";

export type BinaryLookup =
  | { readonly found: true; readonly binaryName: string }
  | { readonly found: false; readonly reason: string };

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Finds the binary a globally installed npm package provides by reading
 * `<global root>/<package>/package.json`. Every failure is reported as a
 * reason, never thrown.
 */
export async function findBinaryForPackage(
  packageIdentifier: string,
  globalRoot: GlobalRootProvider,
  logger: Logger
): Promise<BinaryLookup> {
  let root: string;
  try {
    root = await globalRoot.resolveGlobalRoot();
  } catch (error) {
    return {
      found: false,
      reason: `Could not determine npm global root: ${describeError(error)}`,
    };
  }

  const packageDir = join(root, stripVersionSpecifier(packageIdentifier));
  if (!(await isDirectory(packageDir))) {
    return { found: false, reason: `Package directory not found: ${packageDir}` };
  }

  const manifestPath = join(packageDir, "package.json");
  let manifest: unknown;
  try {
    manifest = JSON.parse(await readFile(manifestPath, "utf8"));
  } catch (error) {
    return {
      found: false,
      reason: `Could not read ${manifestPath}: ${describeError(error)}`,
    };
  }

  const declaration = parseBinaryDeclaration(manifest);
  if (!declaration) {
    return {
      found: false,
      reason: `No binary found in package.json for ${packageIdentifier}`,
    };
  }

  const binaryName = binaryNameFor(declaration, packageIdentifier);
  logger.debug(
    { package: packageIdentifier, manifestPath, bin: declaration.kind },
    `Found binary ${binaryName}`
  );
  return { found: true, binaryName };
}
