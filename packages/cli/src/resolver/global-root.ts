// pattern: Imperative Shell

import { ExecaError } from "execa";

import { createCommand } from "../utils/command/index.js";
import { LookupError } from "../utils/errors.js";

import type { GlobalRootProvider } from "./types.js";
import type { Logger } from "pino";

/**
 * Asks npm for its global `node_modules` directory (`npm root -g`)
 */
export class NpmGlobalRootProvider implements GlobalRootProvider {
  private readonly logger: Logger;
  private readonly npmCommand: string;

  constructor(logger: Logger, npmCommand = "npm") {
    this.logger = logger;
    this.npmCommand = npmCommand;
  }

  async resolveGlobalRoot(): Promise<string> {
    let root: string;
    try {
      root = await createCommand(this.npmCommand, this.logger)
        .addArgs(["root", "-g"])
        .output();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LookupError(
        `\`${this.npmCommand} root -g\` failed: ${reason}`,
        this.npmCommand,
        error instanceof ExecaError ? error.exitCode : undefined
      );
    }

    if (!root) {
      throw new LookupError(
        `\`${this.npmCommand} root -g\` printed no directory`,
        this.npmCommand
      );
    }

    this.logger.debug({ root }, "Resolved npm global root");
    return root;
  }
}

/**
 * A global root given up front (`--npm-root`), no process involved
 */
export class FixedGlobalRootProvider implements GlobalRootProvider {
  private readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  resolveGlobalRoot(): Promise<string> {
    return Promise.resolve(this.root);
  }
}
