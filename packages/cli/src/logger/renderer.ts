// pattern: Functional Core

import chalk, { Chalk, type ChalkInstance } from "chalk";
import { Transform } from "stream";

// Pino log object interface
interface PinoLogObject {
  level: number;
  time?: number;
  pid?: number;
  hostname?: string;
  msg?: string;
  [key: string]: unknown;
}

interface RendererOptions {
  colorize?: boolean;
}

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number"
  );
}

// Format error object with stack trace
function formatErrorObject(err: unknown, c: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const lines: string[] = [];

  if ("message" in err && typeof err.message === "string") {
    lines.push(c.yellow(`    ${err.message}`));
  }

  // nice-format serializer hands us an array, pino's std serializer a string
  const stack: unknown = "stack" in err ? err.stack : undefined;
  const stackLines = Array.isArray(stack)
    ? stack.filter((l): l is string => typeof l === "string")
    : typeof stack === "string"
      ? stack.split("\n").slice(1, 9)
      : [];

  for (const line of stackLines) {
    const trimmedLine = line.trim();
    if (trimmedLine) {
      lines.push(c.dim(c.yellow(`        ${trimmedLine}`)));
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

/**
 * Format a single pino log object to one human-readable line
 */
export function formatLogObject(
  logObj: PinoLogObject,
  c: ChalkInstance = chalk
): string {
  const {
    level,
    time: _time,
    msg,
    pid: _pid,
    hostname: _hostname,
    name: _name,
    err,
    ...extra
  } = logObj;

  let levelDisplay: string;
  let msgColor: (text: string) => string = c.reset;

  switch (level) {
    case 10: // trace
      levelDisplay = c.green("+");
      break;
    case 20: // debug
      levelDisplay = c.cyan("=");
      break;
    case 30: // info
      levelDisplay = c.gray(">");
      break;
    case 40: // warn
      levelDisplay = c.yellowBright("W");
      msgColor = c.yellow;
      break;
    case 50: // error
      levelDisplay = c.inverse.red("E");
      msgColor = c.red;
      break;
    case 60: // fatal
      levelDisplay = c.inverse.redBright("E");
      msgColor = c.red;
      break;
    default:
      levelDisplay = c.gray("  LOG  ");
  }

  const formattedMsg = msgColor(msg ?? "");
  const errorStr = err ? formatErrorObject(err, c) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${c.dim(JSON.stringify(extra))}` : "";

  return `${levelDisplay} ${formattedMsg}${extraStr}${errorStr}\n`;
}

// Create a pretty renderer stream like pino-pretty
export default function createRenderer(
  options: RendererOptions = {}
): Transform {
  const c = options.colorize === false ? new Chalk({ level: 0 }) : chalk;

  return new Transform({
    objectMode: false, // Pino sends newline-delimited JSON strings, not objects
    transform(chunk: Buffer | string, _encoding, callback): void {
      const lines = chunk.toString().split("\n");
      const formattedLines: string[] = [];

      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const parsed: unknown = JSON.parse(line);
          formattedLines.push(
            isPinoLogObject(parsed) ? formatLogObject(parsed, c) : `${line}\n`
          );
        } catch {
          // If we can't parse a line, pass it through as-is
          formattedLines.push(`${line}\n`);
        }
      }

      callback(null, formattedLines.join(""));
    },
  });
}
