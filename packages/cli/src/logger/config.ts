// pattern: Functional Core

import pino from "pino";

import createRenderer from "./renderer.js";
import { type LogFormat, type LogLevel } from "./types.js";

// Map our LogLevel values onto pino's level names
export function mapLogLevelToPinoLevel(logLevel: LogLevel): pino.LevelWithSilent {
  switch (logLevel) {
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

// Create pino logger writing to stderr, either raw or through the nice renderer
export function createLogger(
  format: LogFormat,
  nonInteractive: boolean
): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    name: "lockdrift",
    level: "info",
    serializers: {
      err: (err: unknown) => {
        if (!(err instanceof Error)) {
          if (!err || typeof err !== "object") return err;
          return {
            message: "message" in err ? err.message : undefined,
            stack: "stack" in err ? err.stack : undefined,
          };
        }

        if (format === "nice") {
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
