// pattern: Functional Core

export { createLogger, mapLogLevelToPinoLevel } from "./config.js";
export { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./instance.js";
export type { LogFormat, LogLevel } from "./types.js";
