#!/usr/bin/env node
// pattern: Imperative Shell

import { Command, Option } from "@commander-js/extra-typings";
import { realpathSync } from "fs";
import { fileURLToPath } from "url";

import {
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "../logger/index.js";

import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import { setNonInteractive, setProjectDir } from "./_globals.js";
import { makeOutdatedCommand } from "./outdated.js";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(
      `Invalid log level: ${value}. Valid levels are: ${LOG_LEVELS.join(", ")}`
    );
  }
  return value;
}

export function parseLogFormat(value: string): LogFormat {
  if (!isLogFormat(value)) {
    throw new Error(
      `Invalid log format: ${value}. Valid formats are: ${LOG_FORMATS.join(", ")}`
    );
  }
  return value;
}

// Determine defaults based on environment
export function getDefaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env["LOCKDRIFT_LOG_LEVEL"];
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

export function isNonInteractive(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY
): boolean {
  return !isTTY || env["LOCKDRIFT_NON_INTERACTIVE"] === "1";
}

function getDefaultLogFormat(): LogFormat {
  return isNonInteractive() ? "json" : "nice";
}

// Define the root command
export const rootCommand = new Command("lockdrift")
  .version("0.1.0")
  .description("explain why locked Python packages are outdated")
  .addOption(
    new Option("-l, --log-level <level>", "Set log level")
      .choices(LOG_LEVELS)
      .default(getDefaultLogLevel())
      .argParser(parseLogLevel)
  )
  .addOption(
    new Option("--non-interactive", "Disable colours and interactive features").default(
      isNonInteractive()
    )
  )
  .addOption(
    new Option("-f, --format <format>", "Log output format")
      .choices(LOG_FORMATS)
      .default(getDefaultLogFormat())
      .argParser(parseLogFormat)
  )
  .addOption(
    new Option("-d, --dir <path>", "Project directory (default: current directory)")
  )
  .hook("preAction", thisCommand => {
    // Configure CLI_LOGGER and the project directory before any action runs
    const { logLevel, format, nonInteractive, dir } = thisCommand.opts();

    initializeLogger(format, nonInteractive);
    setCliLogLevel(logLevel);
    setNonInteractive(nonInteractive);
    CLI_LOGGER.debug(
      `Log level configured to: ${logLevel}, format: ${format}, non-interactive: ${nonInteractive}`
    );

    setProjectDir(dir);
    if (dir) {
      CLI_LOGGER.debug(`Project directory override: ${dir}`);
    }
  })
  .addCommand(makeOutdatedCommand(), { isDefault: true });

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  // Nice output until the preAction hook re-initializes from the flags
  initializeLogger(getDefaultLogFormat(), isNonInteractive());

  rootCommand.parse(process.argv);
}
