// pattern: Functional Core

import type { Level } from "pino";

/** Output format for CLI logs on stderr */
export type LogFormat = "nice" | "json";

export type LogLevel = Extract<Level, "error" | "warn" | "info" | "debug" | "trace">;

export const LOG_LEVELS: readonly LogLevel[] = [
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

export const LOG_FORMATS: readonly LogFormat[] = ["nice", "json"];
