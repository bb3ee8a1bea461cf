// pattern: Imperative Shell

import { pino } from "pino";

import { createLogger, mapLogLevelToPinoLevel } from "./config.js";
import { resolveLogDefaults } from "./defaults.js";
import { type LogFormat, type LogLevel } from "./types.js";

let LOGGER: pino.Logger | undefined;

/**
 * Replace the global logger. The CLI calls this once its flags are parsed.
 */
export function initializeLogger(
  format: LogFormat,
  nonInteractive: boolean
): void {
  LOGGER = createLogger(format, nonInteractive);
}

// Library callers that never initialize still get a logger, configured
// from the JAILRUN_* variables the CLI would read
function currentLogger(): pino.Logger {
  if (!LOGGER) {
    const defaults = resolveLogDefaults(
      process.env,
      process.stderr.isTTY === true
    );
    LOGGER = createLogger(defaults.format, defaults.nonInteractive);
    LOGGER.level = mapLogLevelToPinoLevel(defaults.level);
  }
  return LOGGER;
}

export function setCliLogLevel(logLevel: LogLevel): void {
  currentLogger().level = mapLogLevelToPinoLevel(logLevel);
}

/** Always forwards to the current global logger */
export const CLI_LOGGER = new Proxy({} as pino.Logger, {
  get(_target, prop) {
    const logger = currentLogger();
    const value: unknown = Reflect.get(logger, prop);
    if (typeof value === "function") {
      return value.bind(logger);
    }
    return value;
  },
});
