// pattern: Functional Core

import type { ServerEntry } from "../config/types/index.js";
import type {
  ResolutionFailure,
  UnmappedCommandWarning,
} from "../utils/errors.js";

export type Ecosystem = "npm" | "pip" | "uv";

/** Fixed output order of ecosystems in package sets and install plans */
export const ECOSYSTEMS: readonly Ecosystem[] = ["npm", "pip", "uv"];

export interface PackageReference {
  readonly ecosystem: Ecosystem;
  readonly identifier: string;
}

/**
 * A dispatch command rewritten to call its installed binary directly
 */
export interface ResolvedBinary {
  readonly serverName: string;
  readonly packageIdentifier: string;
  readonly binaryName: string;
  /** Args with the package identifier and auto-confirm flags removed */
  readonly remainingArgs: string[];
}

export type BinaryOutcome =
  | { readonly kind: "not-applicable" }
  | { readonly kind: "resolved"; readonly binary: ResolvedBinary }
  | { readonly kind: "unresolved"; readonly failure: ResolutionFailure };

export type PackageOutcome =
  | { readonly kind: "package"; readonly reference: PackageReference }
  | { readonly kind: "skipped"; readonly warning: UnmappedCommandWarning };

export type PackageStrategyName = "args" | "table";

/**
 * Maps one server entry to the package it needs installed.
 * Implementations never throw for unknown commands; they return "skipped".
 */
export interface PackageStrategy {
  readonly name: PackageStrategyName;
  extract(entry: ServerEntry): PackageOutcome;
}

/**
 * Reports the directory global npm packages are installed under.
 * Fails with LookupError.
 */
export interface GlobalRootProvider {
  resolveGlobalRoot(): Promise<string>;
}
