// pattern: Mixed (unavoidable)

import type { ConfigDocument, LoadedConfig } from "../config/types/index.js";
import type { CommandResolver, ResolvedBinary } from "../resolver/index.js";
import type { Logger } from "pino";

export interface RewriteResult {
  document: ConfigDocument;
  /** Servers whose npx dispatch became a direct binary call */
  converted: ResolvedBinary[];
  /** npx servers left as they were because no binary was found */
  unresolved: string[];
}

/**
 * Replaces `npx` dispatches with the binaries of globally installed
 * packages. Every other entry, every other field of a converted entry and
 * every other top-level key is copied unchanged. A document without
 * `mcpServers` is returned as-is.
 */
export async function rewriteDispatchCommands(
  loaded: LoadedConfig,
  resolver: CommandResolver,
  logger: Logger
): Promise<RewriteResult> {
  if (!loaded.configuration) {
    logger.warn(
      `No mcpServers in ${loaded.path}, writing configuration unchanged`
    );
    return { document: loaded.document, converted: [], unresolved: [] };
  }

  const converted: ResolvedBinary[] = [];
  const unresolved: string[] = [];
  const rewritten = new Map<string, unknown>();

  for (const skipped of loaded.configuration.skipped) {
    logger.warn(
      { server: skipped.name, problems: skipped.problems },
      `Copying ${skipped.name} unchanged: not a server entry mcpbake can read`
    );
  }

  // One entry at a time, in declaration order
  for (const entry of loaded.configuration.servers) {
    const outcome = await resolver.resolveBinary(entry);

    switch (outcome.kind) {
      case "resolved": {
        const { binary } = outcome;
        rewritten.set(entry.name, {
          ...entry.raw,
          command: binary.binaryName,
          args: binary.remainingArgs,
        });
        converted.push(binary);
        logger.info(
          `Converted ${entry.name}: npx ${binary.packageIdentifier} -> ${binary.binaryName}`
        );
        break;
      }
      case "unresolved":
        unresolved.push(entry.name);
        break;
      case "not-applicable":
        break;
    }
  }

  // Built from pairs so names such as "__proto__" stay own properties
  const mcpServers = Object.fromEntries(
    loaded.configuration.declared.map(
      ([name, raw]) => [name, rewritten.get(name) ?? raw] as const
    )
  );

  return {
    document: { ...loaded.document, mcpServers },
    converted,
    unresolved,
  };
}
