#!/usr/bin/env node
// pattern: Imperative Shell

import { getDefaultLogFormat, isNonInteractive } from "./_options.js";
import { initializeLogger } from "./_deps.js";
import { rootCommand } from "./index.js";

// Initialize logger up front so errors raised while parsing arguments are
// formatted; the preAction hook re-initializes it from the CLI flags
initializeLogger(getDefaultLogFormat(), isNonInteractive());

await rootCommand.parseAsync(process.argv);
