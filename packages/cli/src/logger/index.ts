// pattern: Functional Core

export { createLogger, mapLogLevelToPinoLevel } from "./config.js";
export { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./instance.js";
export { default as createRenderer, formatLogLine } from "./renderer.js";
export { LOG_FORMATS, LOG_LEVELS } from "./types.js";
export type { LogFormat, LogLevel } from "./types.js";
