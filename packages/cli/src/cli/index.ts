// pattern: Imperative Shell

import { Command, Option } from "@commander-js/extra-typings";

import { makeConvertCommand } from "./convert.js";
import { makeDockerfileCommand } from "./dockerfile.js";
import {
  getDefaultLogFormat,
  getDefaultLogLevel,
  isNonInteractive,
  LOG_FORMATS,
  LOG_LEVELS,
  parseLogFormat,
  parseLogLevel,
} from "./_options.js";
import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import { makePackagesCommand } from "./packages.js";

// Define the root command
export const rootCommand = new Command("mcpbake")
  .version("0.1.0")
  .description(
    "bake MCP server configurations into container images with their binaries preinstalled"
  )
  .addOption(
    new Option("-l, --log-level <level>", "Set log level")
      .choices(LOG_LEVELS)
      .default(getDefaultLogLevel())
      .argParser(parseLogLevel)
  )
  .addOption(
    new Option(
      "--non-interactive",
      "Log without colours and with full error details (default without a TTY or with MCPBAKE_NON_INTERACTIVE=1)"
    ).default(isNonInteractive())
  )
  .addOption(
    new Option("-f, --format <format>", "Output format")
      .choices(LOG_FORMATS)
      .default(getDefaultLogFormat())
      .argParser(parseLogFormat)
  )
  .addCommand(makeConvertCommand())
  .addCommand(makeDockerfileCommand())
  .addCommand(makePackagesCommand());

rootCommand.hook("preAction", () => {
  // Configure CLI_LOGGER before any action runs
  const { logLevel, format, nonInteractive } = rootCommand.opts();

  initializeLogger(format, nonInteractive);
  setCliLogLevel(logLevel);
  CLI_LOGGER.debug(
    `Log level configured to: ${logLevel}, format: ${format}, non-interactive: ${nonInteractive}`
  );
});
