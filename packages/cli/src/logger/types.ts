// pattern: Functional Core

import { type Level } from "pino";

export type LogLevel = Level;

// "nice" is the human renderer, "json" is raw pino NDJSON
export type LogFormat = "nice" | "json";
