// pattern: Imperative Shell
// CLI command for printing the packages a configuration needs

import { Command } from "@commander-js/extra-typings";

import { DEFAULT_DOCKERFILE_CONFIG, planPackages } from "../dockerfile/index.js";
import { createPackageStrategy } from "../resolver/index.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { strategyOption, tableOption } from "./_strategy-options.js";

import type { PackageStrategyName } from "../resolver/index.js";

interface PackagesCommandOptions {
  config: string;
  strategy: PackageStrategyName;
  table?: string | undefined;
  strict: boolean;
  json: boolean;
}

async function runPackages(options: PackagesCommandOptions): Promise<void> {
  const packageStrategy = await createPackageStrategy(options.strategy, {
    tablePath: options.table,
  });

  const plan = await planPackages({
    configPath: options.config,
    mode: options.strict ? "strict" : "permissive",
    packageStrategy,
    logger: CLI_LOGGER,
  });

  if (options.json) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(plan.packages.toJSON(), null, 2));
    return;
  }

  for (const line of plan.installPlan) {
    // eslint-disable-next-line no-console
    console.log(line);
  }
}

/**
 * Create the 'mcpbake packages' command
 */
export function makePackagesCommand() {
  return new Command("packages")
    .description("Print the install commands a server configuration needs")
    .option("-c, --config <path>", "Server configuration", DEFAULT_DOCKERFILE_CONFIG)
    .addOption(strategyOption())
    .addOption(tableOption())
    .option("--strict", "Fail when the configuration has no mcpServers", false)
    .option("--json", "Print the package set as JSON", false)
    .action(options => withErrorHandling(runPackages)(options));
}
