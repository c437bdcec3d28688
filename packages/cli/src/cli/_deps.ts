// pattern: Imperative Shell
// Process-wide dependencies shared by the CLI commands

export {
  CLI_LOGGER,
  initializeLogger,
  setCliLogLevel,
} from "../logger/index.js";
