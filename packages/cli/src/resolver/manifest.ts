// pattern: Functional Core

import { PackageManifestV1 } from "../config/types/index.js";
import { ajv } from "../utils/ajv.js";

import { defaultBinaryName } from "./package-name.js";

const validatePackageManifest = ajv.compile<PackageManifestV1>(
  PackageManifestV1
);

/**
 * The two shapes npm accepts for `bin`, told apart once at parse time
 */
export type BinaryDeclaration =
  | { readonly kind: "single"; readonly path: string }
  | {
      readonly kind: "multiple";
      /** name -> path, in declaration order */
      readonly binaries: ReadonlyArray<readonly [string, string]>;
    };

/**
 * Returns null when the manifest has no usable `bin` (absent, empty string,
 * empty mapping, or a shape npm would reject)
 */
export function parseBinaryDeclaration(
  manifest: unknown
): BinaryDeclaration | null {
  if (!validatePackageManifest(manifest) || manifest.bin === undefined) {
    return null;
  }

  if (typeof manifest.bin === "string") {
    return manifest.bin ? { kind: "single", path: manifest.bin } : null;
  }

  const binaries = Object.entries(manifest.bin);
  return binaries.length > 0 ? { kind: "multiple", binaries } : null;
}

/**
 * Binary a dispatch command should call: the package name for a single
 * `bin`, otherwise the first declared name.
 */
export function binaryNameFor(
  declaration: BinaryDeclaration,
  packageIdentifier: string
): string {
  switch (declaration.kind) {
    case "single":
      return defaultBinaryName(packageIdentifier);
    case "multiple": {
      const [first] = declaration.binaries;
      return first ? first[0] : defaultBinaryName(packageIdentifier);
    }
  }
}
