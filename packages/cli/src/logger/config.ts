// pattern: Functional Core

import { pino } from "pino";

import createRenderer from "./renderer.js";
import { type LogFormat, type LogLevel } from "./types.js";

// Map our LogLevel to pino's string levels
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

// Create pino logger with stream configuration
export function createLogger(
  format: LogFormat,
  nonInteractive: boolean
): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    name: "jailrun",
    level: "info",
    serializers: {
      err: (err: unknown) => {
        if (!(err instanceof Error)) return err;

        // The nice renderer prints message and a trimmed stack itself
        if (format === "nice" && !nonInteractive) {
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
    // Pino writes JSON lines; the renderer turns them into coloured text
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(process.stderr);
    return pino(baseConfig, renderer);
  }

  return pino(baseConfig, pino.destination(2));
}
