// pattern: Functional Core

import {
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "./types.js";

export interface LogDefaults {
  level: LogLevel;
  format: LogFormat;
  nonInteractive: boolean;
}

/**
 * Logger settings taken from the `JAILRUN_*` environment variables.
 *
 * Unknown values fall back to `info`. The format is `json` whenever the
 * session is non-interactive, unless `JAILRUN_LOG_FORMAT` names one.
 */
export function resolveLogDefaults(
  env: NodeJS.ProcessEnv,
  stderrIsTTY: boolean
): LogDefaults {
  const nonInteractive =
    !stderrIsTTY || env["JAILRUN_NON_INTERACTIVE"] === "1";
  const level =
    LOG_LEVELS.find(candidate => candidate === env["JAILRUN_LOG_LEVEL"]) ??
    "info";
  const format =
    LOG_FORMATS.find(candidate => candidate === env["JAILRUN_LOG_FORMAT"]) ??
    (nonInteractive ? "json" : "nice");

  return { level, format, nonInteractive };
}
