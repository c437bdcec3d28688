// pattern: Imperative Shell
// Process-wide logger used by the CLI; library code takes a pino.Logger instead

import pino from "pino";

import { createLogger, mapLogLevelToPinoLevel } from "./config.js";
import { type LogFormat, type LogLevel } from "./types.js";

const NOT_READY = "CLI logger used before initializeLogger()";

let current: pino.Logger | undefined;

function requireLogger(): pino.Logger {
  if (!current) {
    throw new Error(NOT_READY);
  }
  return current;
}

/** Replaces the CLI logger; called once at startup and again from the preAction hook */
export function initializeLogger(
  format: LogFormat,
  nonInteractive: boolean
): void {
  current = createLogger(format, nonInteractive);
}

export function setCliLogLevel(logLevel: LogLevel): void {
  requireLogger().level = mapLogLevelToPinoLevel(logLevel);
}

/**
 * Stable handle on whichever logger initializeLogger() installed last, so
 * modules can import it before the flags are parsed
 */
export const CLI_LOGGER = new Proxy({} as pino.Logger, {
  get(_target, prop) {
    const logger = requireLogger();
    const value: unknown = Reflect.get(logger, prop);
    return typeof value === "function" ? value.bind(logger) : value;
  },
});
