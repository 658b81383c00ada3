// pattern: Imperative Shell

import { loadServersConfig } from "../config/loaders/servers-config-loader.js";
import { writeServersConfig } from "../config/writers/servers-config-writer.js";
import { CommandResolver } from "../resolver/index.js";

import { rewriteDispatchCommands, type RewriteResult } from "./config-rewriter.js";

import type { LoadMode } from "../config/types/index.js";
import type { GlobalRootProvider } from "../resolver/index.js";
import type { Logger } from "pino";

export const DEFAULT_CONVERT_INPUT = "/app/config.json";
export const DEFAULT_CONVERT_OUTPUT = "/tmp/config.json";

export interface ConvertConfigOptions {
  inputPath: string;
  outputPath: string;
  mode: LoadMode;
  logger: Logger;
  /** `npm root -g` when absent */
  globalRoot?: GlobalRootProvider | undefined;
}

/**
 * Reads a server configuration, rewrites npx dispatches to installed
 * binaries and writes the result to `outputPath`
 */
export async function convertConfigFile(
  options: ConvertConfigOptions
): Promise<RewriteResult> {
  const { logger } = options;

  const loaded = await loadServersConfig(options.inputPath, {
    mode: options.mode,
  });
  const resolver = new CommandResolver({
    logger,
    globalRoot: options.globalRoot,
  });

  const result = await rewriteDispatchCommands(loaded, resolver, logger);
  await writeServersConfig(options.outputPath, result.document);

  logger.info(
    { converted: result.converted.length, unresolved: result.unresolved.length },
    `Successfully converted config and saved to ${options.outputPath}`
  );
  return result;
}
