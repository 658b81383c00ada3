// pattern: Functional Core

import { InvalidArgumentError } from "@commander-js/extra-typings";

import { PACKAGE_STRATEGY_NAMES } from "../resolver/index.js";

import type { LogFormat, LogLevel } from "../logger/index.js";
import type { PackageStrategyName } from "../resolver/index.js";

export const LOG_LEVELS: readonly LogLevel[] = [
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];
export const LOG_FORMATS: readonly LogFormat[] = ["nice", "json"];

function isOneOf<T extends string>(
  values: readonly T[],
  value: string
): value is T {
  return values.some(v => v === value);
}

export function parseLogLevel(value: string): LogLevel {
  if (!isOneOf(LOG_LEVELS, value)) {
    throw new InvalidArgumentError(
      `Invalid log level: ${value}. Valid levels are: ${LOG_LEVELS.join(", ")}`
    );
  }
  return value;
}

export function parseLogFormat(value: string): LogFormat {
  if (!isOneOf(LOG_FORMATS, value)) {
    throw new InvalidArgumentError(
      `Invalid log format: ${value}. Valid formats are: ${LOG_FORMATS.join(", ")}`
    );
  }
  return value;
}

export function parseStrategyName(value: string): PackageStrategyName {
  if (!isOneOf(PACKAGE_STRATEGY_NAMES, value)) {
    throw new InvalidArgumentError(
      `Invalid strategy: ${value}. Valid strategies are: ${PACKAGE_STRATEGY_NAMES.join(", ")}`
    );
  }
  return value;
}

export function getDefaultLogLevel(
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  const envLevel = env["MCPBAKE_LOG_LEVEL"];
  if (envLevel && isOneOf(LOG_LEVELS, envLevel)) {
    return envLevel;
  }
  return "info";
}

export function isNonInteractive(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): boolean {
  return !isTTY || env["MCPBAKE_NON_INTERACTIVE"] === "1";
}

export function getDefaultLogFormat(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): LogFormat {
  return isNonInteractive(env, isTTY) ? "json" : "nice";
}
