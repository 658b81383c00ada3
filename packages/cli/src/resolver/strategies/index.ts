// pattern: Imperative Shell

import { ArgumentPatternStrategy } from "./argument-pattern.js";
import { loadCommandTable, StaticTableStrategy } from "./static-table.js";

import type { PackageStrategy, PackageStrategyName } from "../types.js";

export * from "./argument-pattern.js";
export * from "./static-table.js";

export const PACKAGE_STRATEGY_NAMES: readonly PackageStrategyName[] = [
  "args",
  "table",
];

export interface PackageStrategyOptions {
  /** Command table for the "table" strategy; the bundled one when absent */
  tablePath?: string | undefined;
}

export async function createPackageStrategy(
  name: PackageStrategyName,
  options: PackageStrategyOptions = {}
): Promise<PackageStrategy> {
  switch (name) {
    case "args":
      return new ArgumentPatternStrategy();
    case "table":
      return new StaticTableStrategy(await loadCommandTable(options.tablePath));
  }
}
