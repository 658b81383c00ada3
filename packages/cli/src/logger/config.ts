// pattern: Functional Core

import { pino } from "pino";

import createRenderer from "./renderer.js";
import { type LogFormat, type LogLevel } from "./types.js";

export function mapLogLevelToPinoLevel(logLevel: LogLevel): pino.LevelWithSilent {
  switch (logLevel) {
    case "fatal":
    case "error":
      return "error";
    case "warn":
      return "warn";
    case "info":
      return "info";
    case "debug":
      return "debug";
    case "trace":
      return "trace";
    default:
      return "info";
  }
}

// Both formats write to stderr so stdout stays free for command output
export function createLogger(
  format: LogFormat,
  nonInteractive: boolean
): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    name: "mcpbake",
    level: "info",
    serializers: {
      err: (err: unknown) => {
        if (!(err instanceof Error)) return err;

        if (format === "nice" && !nonInteractive) {
          return {
            message: err.message,
            stack: err.stack ? err.stack.split("\n").slice(1, 9) : undefined,
          };
        }

        return pino.stdSerializers.err(err);
      },
    },
  };

  if (format === "nice") {
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(process.stderr);
    return pino(baseConfig, renderer);
  }

  return pino(baseConfig, pino.destination(2));
}
