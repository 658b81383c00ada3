// pattern: Imperative Shell

import { type Logger, pino } from "pino";

export interface RecordedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export interface RecordingLogger {
  logger: Logger;
  /** Parsed records in the order they were written */
  records: RecordedLog[];
  /** Messages logged at exactly `level` (pino numeric levels: 30 info, 40 warn) */
  messages: (level: number) => string[];
}

function isRecordedLog(value: unknown): value is RecordedLog {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "msg" in value &&
    typeof value.msg === "string"
  );
}

/**
 * A pino logger that keeps its output in memory so tests can assert on
 * diagnostics
 */
export function createRecordingLogger(level = "debug"): RecordingLogger {
  const records: RecordedLog[] = [];
  const logger = pino(
    { level },
    {
      write(line: string): void {
        const parsed: unknown = JSON.parse(line);
        if (isRecordedLog(parsed)) {
          records.push(parsed);
        }
      },
    }
  );

  return {
    logger,
    records,
    messages: (wanted: number) =>
      records.filter(r => r.level === wanted).map(r => r.msg),
  };
}
