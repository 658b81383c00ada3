// pattern: Imperative Shell
// CLI command for rewriting npx-dispatched servers to installed binaries

import { Command, Option } from "@commander-js/extra-typings";

import { FixedGlobalRootProvider } from "../resolver/index.js";
import {
  convertConfigFile,
  DEFAULT_CONVERT_INPUT,
  DEFAULT_CONVERT_OUTPUT,
} from "../rewriter/index.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";

interface ConvertCommandOptions {
  input: string;
  output: string;
  npmRoot?: string | undefined;
  strict: boolean;
}

async function runConvert(options: ConvertCommandOptions): Promise<void> {
  CLI_LOGGER.debug({ options }, "Converting server configuration");

  const result = await convertConfigFile({
    inputPath: options.input,
    outputPath: options.output,
    mode: options.strict ? "strict" : "permissive",
    logger: CLI_LOGGER,
    globalRoot: options.npmRoot
      ? new FixedGlobalRootProvider(options.npmRoot)
      : undefined,
  });

  if (result.unresolved.length > 0) {
    CLI_LOGGER.warn(
      `${result.unresolved.length} server(s) kept as npx: ${result.unresolved.join(", ")}`
    );
  }
}

/**
 * Create the 'mcpbake convert' command
 */
export function makeConvertCommand() {
  return new Command("convert")
    .description(
      "Rewrite npx-dispatched servers to call their globally installed binary"
    )
    .addHelpText(
      "after",
      `
Examples:
  mcpbake convert                                 /app/config.json -> /tmp/config.json
  mcpbake convert -i servers.yaml -o out.yaml     Convert a YAML configuration
  mcpbake convert --npm-root /usr/lib/node_modules
      `
    )
    .addOption(
      new Option("-i, --input <path>", "Configuration to read")
        .env("MCPBAKE_INPUT")
        .default(DEFAULT_CONVERT_INPUT)
    )
    .addOption(
      new Option("-o, --output <path>", "Where to write the rewritten configuration")
        .env("MCPBAKE_OUTPUT")
        .default(DEFAULT_CONVERT_OUTPUT)
    )
    .option(
      "--npm-root <dir>",
      "Global node_modules directory (skips `npm root -g`)"
    )
    .option("--strict", "Fail when the configuration has no mcpServers", false)
    .action(options => withErrorHandling(runConvert)(options));
}
