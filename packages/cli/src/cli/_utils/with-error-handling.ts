// pattern: Imperative Shell

import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Higher-order function that wraps Commander.js actions with consistent error handling
 *
 * Fatal errors are logged with suggestions (plus technical details at
 * debug level) and the process exits with code 1.
 *
 * @param action The action function to wrap with error handling
 * @returns Wrapped action function with consistent error handling
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const isDebugMode = CLI_LOGGER.isLevelEnabled("debug");
      const analyzed = analyzeError(error);

      if (analyzed.userMessage) {
        CLI_LOGGER.error(analyzed.userMessage);
      }

      analyzed.suggestions.forEach(suggestion => {
        CLI_LOGGER.error(`  • ${suggestion}`);
      });

      if (isDebugMode) {
        CLI_LOGGER.debug("Technical error details:");
        CLI_LOGGER.debug(analyzed.technicalMessage);
        if (error instanceof Error && error.stack) {
          CLI_LOGGER.debug("Stack trace:");
          CLI_LOGGER.debug(error.stack);
        }
      }

      // Ensure logs are flushed before exit
      CLI_LOGGER.flush();

      setTimeout(() => {
        process.exit(1);
      }, 100);
    }
  };
}
