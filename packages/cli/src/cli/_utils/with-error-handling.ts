// pattern: Imperative Shell

import { CLI_LOGGER } from "../../logger/index.js";

import { analyzeError, exitCodeFor } from "./error-analysis.js";

import type { Logger } from "pino";

/**
 * Log an error with its suggestions, and its details at debug level.
 * Returns the exit status the CLI should end with.
 */
export function reportError(
  error: unknown,
  logger: Logger = CLI_LOGGER
): number {
  const analyzed = analyzeError(error);

  logger.error({ category: analyzed.category }, analyzed.userMessage);
  for (const suggestion of analyzed.suggestions) {
    logger.error(`  • ${suggestion}`);
  }

  if (logger.isLevelEnabled("debug")) {
    logger.debug(
      { err: error, technicalMessage: analyzed.technicalMessage },
      "Error details"
    );
  }

  return exitCodeFor(error);
}

/**
 * Wraps a Commander.js action so that any error is reported and sets the
 * process exit code, instead of escaping as an unhandled rejection
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      process.exitCode = reportError(error);
      CLI_LOGGER.flush();
    }
  };
}
