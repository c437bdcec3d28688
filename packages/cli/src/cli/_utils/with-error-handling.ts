// pattern: Imperative Shell

import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Wraps a Commander action so that any failure is logged as a user-facing
 * message with suggestions and the process exits with code 1. Technical
 * details and the stack are logged at debug level.
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const analyzed = analyzeError(error);

      if (analyzed.userMessage) {
        CLI_LOGGER.error(analyzed.userMessage);
      }
      for (const suggestion of analyzed.suggestions) {
        CLI_LOGGER.error(`  • ${suggestion}`);
      }

      if (CLI_LOGGER.isLevelEnabled("debug")) {
        CLI_LOGGER.debug(
          { err: error, category: analyzed.category },
          analyzed.technicalMessage
        );
      }

      CLI_LOGGER.flush();

      // leave time for the renderer stream to drain
      setTimeout(() => {
        process.exit(1);
      }, 100);
    }
  };
}
