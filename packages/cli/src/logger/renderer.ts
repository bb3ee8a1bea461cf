// pattern: Functional Core

import { Transform } from "node:stream";

import { Chalk, type ChalkInstance } from "chalk";

// Pino log object interface
interface PinoLogObject {
  level: number;
  time?: number;
  pid?: number;
  hostname?: string;
  msg?: string;
  err?: unknown;
  [key: string]: unknown;
}

// Renderer options interface
export interface RendererOptions {
  colorize?: boolean;
}

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number"
  );
}

// Format error object with stack trace
function formatErrorObject(chalk: ChalkInstance, err: unknown): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const lines: string[] = [];

  if ("message" in err && typeof err.message === "string") {
    lines.push(chalk.yellow(`    ${err.message}`));
  }

  // The serializer already trims the stack for nice output; accept both shapes
  if ("stack" in err) {
    const stackLines =
      typeof err.stack === "string"
        ? err.stack.split("\n").slice(1, 9)
        : Array.isArray(err.stack)
          ? err.stack.filter((line): line is string => typeof line === "string")
          : [];

    for (const line of stackLines) {
      const trimmedLine = line.trim();
      if (trimmedLine) {
        lines.push(chalk.dim(chalk.yellow(`        ${trimmedLine}`)));
      }
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

// Format a single log object to a nice string
export function formatLogObject(
  logObj: PinoLogObject,
  chalk: ChalkInstance
): string {
  const {
    level,
    msg,
    err,
    time: _time,
    pid: _pid,
    hostname: _hostname,
    name: _name,
    ...extra
  } = logObj;

  let levelDisplay: string;
  let msgColor = chalk.reset;

  switch (level) {
    case 10: // trace
      levelDisplay = chalk.green("+");
      break;
    case 20: // debug
      levelDisplay = chalk.cyan("=");
      break;
    case 30: // info
      levelDisplay = chalk.gray(">");
      break;
    case 40: // warn
      levelDisplay = chalk.yellowBright("W");
      msgColor = chalk.yellow;
      break;
    case 50: // error
      levelDisplay = chalk.inverse.red("E");
      msgColor = chalk.red;
      break;
    case 60: // fatal
      levelDisplay = chalk.inverse.redBright("E");
      msgColor = chalk.red;
      break;
    default:
      levelDisplay = chalk.gray("  LOG  ");
  }

  const formattedMsg = msgColor(msg ?? "");
  const errorStr = err ? formatErrorObject(chalk, err) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${chalk.dim(JSON.stringify(extra))}` : "";

  return `${levelDisplay} ${formattedMsg}${extraStr}${errorStr}\n`;
}

// Create a pretty renderer stream like pino-pretty
export default function createRenderer(
  options: RendererOptions = {}
): Transform {
  const chalk = new Chalk(options.colorize === false ? { level: 0 } : {});

  return new Transform({
    objectMode: false, // Pino sends newline-delimited JSON strings, not objects
    transform(chunk: Buffer | string, _encoding, callback): void {
      const formattedLines: string[] = [];

      for (const line of chunk.toString().split("\n")) {
        if (!line.trim()) {
          continue;
        }
        try {
          const parsed: unknown = JSON.parse(line);
          formattedLines.push(
            isPinoLogObject(parsed)
              ? formatLogObject(parsed, chalk)
              : `${line}\n`
          );
        } catch {
          // Not JSON; pass the line through as-is
          formattedLines.push(`${line}\n`);
        }
      }

      callback(null, formattedLines.join(""));
    },
  });
}
