// pattern: Functional Core

import { isFlag } from "./package-name.js";

/** Command that runs a package on demand instead of a pre-installed binary */
export const NPM_DISPATCH_COMMAND = "npx";

/** Flags that only tell the runner to install without asking */
export const AUTO_CONFIRM_FLAGS: ReadonlySet<string> = new Set(["-y", "--yes"]);

export interface ClassifiedDispatchArgs {
  packageIdentifier: string | null;
  passThroughArgs: string[];
}

/**
 * Splits runner args into the package to run and the args meant for it.
 *
 * Auto-confirm flags are dropped wherever they appear. The first token that
 * is not a flag (scoped names included) claims the package slot; every later
 * token, scoped or not, passes through in order.
 */
export function classifyDispatchArgs(
  args: readonly string[]
): ClassifiedDispatchArgs {
  let packageIdentifier: string | null = null;
  const passThroughArgs: string[] = [];

  for (const arg of args) {
    if (AUTO_CONFIRM_FLAGS.has(arg)) {
      continue;
    }
    if (packageIdentifier === null && !isFlag(arg)) {
      packageIdentifier = arg;
      continue;
    }
    passThroughArgs.push(arg);
  }

  return { packageIdentifier, passThroughArgs };
}
