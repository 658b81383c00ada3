// pattern: Functional Core

import { Option } from "@commander-js/extra-typings";

import { PACKAGE_STRATEGY_NAMES } from "../resolver/index.js";

import { parseStrategyName } from "./_options.js";

/**
 * `-s, --strategy` shared by the commands that collect packages
 */
export function strategyOption() {
  return new Option(
    "-s, --strategy <strategy>",
    "How packages are derived from server commands"
  )
    .choices(PACKAGE_STRATEGY_NAMES)
    .default("args" as const)
    .argParser(parseStrategyName);
}

export function tableOption() {
  return new Option(
    "--table <path>",
    "JSON command table for --strategy table (defaults to the bundled one)"
  );
}
