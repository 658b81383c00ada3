// pattern: Imperative Shell
// CLI command for rendering a Dockerfile template with package installs

import { Command } from "@commander-js/extra-typings";

import {
  DEFAULT_DOCKERFILE_CONFIG,
  DEFAULT_DOCKERFILE_OUTPUT,
  DEFAULT_DOCKERFILE_TEMPLATE,
  generateDockerfile,
} from "../dockerfile/index.js";
import { createPackageStrategy } from "../resolver/index.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { strategyOption, tableOption } from "./_strategy-options.js";

import type { PackageStrategyName } from "../resolver/index.js";

interface DockerfileCommandOptions {
  config: string;
  template: string;
  output: string;
  strategy: PackageStrategyName;
  table?: string | undefined;
  strict: boolean;
}

async function runDockerfile(options: DockerfileCommandOptions): Promise<void> {
  const packageStrategy = await createPackageStrategy(options.strategy, {
    tablePath: options.table,
  });
  CLI_LOGGER.debug(`Collecting packages with the ${options.strategy} strategy`);

  await generateDockerfile({
    configPath: options.config,
    templatePath: options.template,
    outputPath: options.output,
    mode: options.strict ? "strict" : "permissive",
    packageStrategy,
    logger: CLI_LOGGER,
  });
}

/**
 * Create the 'mcpbake dockerfile' command
 */
export function makeDockerfileCommand() {
  return new Command("dockerfile")
    .description(
      "Render a Dockerfile template with the installs the configuration needs"
    )
    .addHelpText(
      "before",
      `
The template line containing
  {{range .MCPPackages}} && npm install -g {{.}}{{end}}
is replaced by one install command per package (npm, then pip, then uv).
When no packages are found the line is removed.
      `
    )
    .option("-c, --config <path>", "Server configuration", DEFAULT_DOCKERFILE_CONFIG)
    .option("-t, --template <path>", "Dockerfile template", DEFAULT_DOCKERFILE_TEMPLATE)
    .option("-o, --output <path>", "Dockerfile to write", DEFAULT_DOCKERFILE_OUTPUT)
    .addOption(strategyOption())
    .addOption(tableOption())
    .option("--strict", "Fail when the configuration has no mcpServers", false)
    .action(options => withErrorHandling(runDockerfile)(options));
}
