// pattern: Mixed (unavoidable)

import { ResolutionFailure, UnmappedCommandWarning } from "../utils/errors.js";

import { findBinaryForPackage } from "./binary-resolver.js";
import {
  classifyDispatchArgs,
  NPM_DISPATCH_COMMAND,
} from "./dispatch-args.js";
import { NpmGlobalRootProvider } from "./global-root.js";
import { PackageSet } from "./package-set.js";
import { ArgumentPatternStrategy } from "./strategies/index.js";

import type {
  Configuration,
  ServerEntry,
} from "../config/types/index.js";
import type {
  BinaryOutcome,
  GlobalRootProvider,
  PackageOutcome,
  PackageStrategy,
} from "./types.js";
import type { Logger } from "pino";

export interface CommandResolverOptions {
  logger: Logger;
  /** Where installed npm packages live; `npm root -g` when absent */
  globalRoot?: GlobalRootProvider | undefined;
  /** How commands map to packages; argument patterns when absent */
  packageStrategy?: PackageStrategy | undefined;
}

/**
 * Single entry point for turning server entries into binaries (for config
 * rewriting) or packages (for install plans). The package strategy is chosen
 * by the caller and never mixed within one run.
 */
export class CommandResolver {
  private readonly logger: Logger;
  private readonly globalRoot: GlobalRootProvider;
  private readonly packageStrategy: PackageStrategy;

  constructor(options: CommandResolverOptions) {
    this.logger = options.logger;
    this.globalRoot =
      options.globalRoot ?? new NpmGlobalRootProvider(options.logger);
    this.packageStrategy =
      options.packageStrategy ?? new ArgumentPatternStrategy();
  }

  get strategyName(): PackageStrategy["name"] {
    return this.packageStrategy.name;
  }

  /**
   * Resolves an `npx` entry to the binary its globally installed package
   * provides. Entries with any other command are not applicable, so
   * resolving an already rewritten entry does nothing.
   */
  async resolveBinary(entry: ServerEntry): Promise<BinaryOutcome> {
    if (entry.command !== NPM_DISPATCH_COMMAND || entry.args.length === 0) {
      return { kind: "not-applicable" };
    }

    const logger = this.logger.child({ server: entry.name });
    const { packageIdentifier, passThroughArgs } = classifyDispatchArgs(
      entry.args
    );

    if (packageIdentifier === null) {
      const failure = new ResolutionFailure(
        `No package identifier in npx args for ${entry.name}, keeping as npx`,
        entry.name
      );
      logger.warn(failure.message);
      return { kind: "unresolved", failure };
    }

    const lookup = await findBinaryForPackage(
      packageIdentifier,
      this.globalRoot,
      logger
    );

    if (!lookup.found) {
      const failure = new ResolutionFailure(
        `Could not find binary for ${packageIdentifier}, keeping as npx: ${lookup.reason}`,
        entry.name,
        packageIdentifier
      );
      logger.warn(failure.message);
      return { kind: "unresolved", failure };
    }

    return {
      kind: "resolved",
      binary: {
        serverName: entry.name,
        packageIdentifier,
        binaryName: lookup.binaryName,
        remainingArgs: passThroughArgs,
      },
    };
  }

  /**
   * Entries without a command (remote servers) need nothing installed;
   * everything else goes to the package strategy.
   */
  extractPackage(entry: ServerEntry): PackageOutcome {
    if (entry.command === "") {
      return {
        kind: "skipped",
        warning: new UnmappedCommandWarning(
          entry.name,
          entry.command,
          `No command for ${entry.name}, nothing to install`
        ),
      };
    }
    return this.packageStrategy.extract(entry);
  }

  /**
   * Applies the package strategy to every entry. Skipped entries, and
   * entries the loader could not read, are logged as warnings; a null
   * configuration yields an empty set.
   */
  collectPackages(configuration: Configuration | null): PackageSet {
    const packages = new PackageSet();
    if (!configuration) {
      this.logger.warn("No mcpServers in configuration, nothing to install");
      return packages;
    }

    for (const skipped of configuration.skipped) {
      this.logger.warn(
        { server: skipped.name, problems: skipped.problems },
        `Skipping ${skipped.name}: not a server entry mcpbake can read`
      );
    }

    for (const entry of configuration.servers) {
      const outcome = this.extractPackage(entry);
      switch (outcome.kind) {
        case "package": {
          const { ecosystem, identifier } = outcome.reference;
          packages.add(outcome.reference);
          this.logger.info(
            { server: entry.name, strategy: this.packageStrategy.name },
            `Found ${ecosystem} package for ${entry.name}: ${identifier}`
          );
          break;
        }
        case "skipped":
          this.logger.warn(
            { server: entry.name, strategy: this.packageStrategy.name },
            outcome.warning.message
          );
          break;
      }
    }

    return packages;
  }
}
