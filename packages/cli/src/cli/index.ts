#!/usr/bin/env node
// pattern: Imperative Shell

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { Command, Option } from "@commander-js/extra-typings";

import {
  CLI_LOGGER,
  initializeLogger,
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
  resolveLogDefaults,
  setCliLogLevel,
} from "../logger/index.js";

import { makeSchemaCommand } from "./schema/index.js";
import { makeArgsCommand } from "./args.js";
import { makeRunCommand } from "./run.js";

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find(candidate => candidate === value);
  if (!level) {
    throw new Error(
      `Invalid log level: ${value}. Valid levels are: ${LOG_LEVELS.join(", ")}`
    );
  }
  return level;
}

function parseLogFormat(value: string): LogFormat {
  const format = LOG_FORMATS.find(candidate => candidate === value);
  if (!format) {
    throw new Error(
      `Invalid log format: ${value}. Valid formats are: ${LOG_FORMATS.join(", ")}`
    );
  }
  return format;
}

const logDefaults = resolveLogDefaults(
  process.env,
  process.stderr.isTTY === true
);

// Define the root command
export const rootCommand = new Command("jailrun")
  .version("0.1.0")
  .description("run programs inside firejail sandboxes")
  .enablePositionalOptions()
  .addOption(
    new Option("-l, --log-level <level>", "Set log level")
      .choices(LOG_LEVELS)
      .default(logDefaults.level)
      .argParser(parseLogLevel)
  )
  .addOption(
    new Option("--non-interactive", "Disable interactive features").default(
      logDefaults.nonInteractive
    )
  )
  .addOption(
    new Option("-f, --format <format>", "Log output format")
      .choices(LOG_FORMATS)
      .default(logDefaults.format)
      .argParser(parseLogFormat)
  )
  .hook("preAction", thisCommand => {
    // Configure CLI_LOGGER before any action runs
    const options = thisCommand.opts();
    const logLevel = parseLogLevel(String(options["logLevel"]));
    const format = parseLogFormat(String(options["format"]));
    const nonInteractive = options["nonInteractive"] === true;

    initializeLogger(format, nonInteractive);
    setCliLogLevel(logLevel);
    CLI_LOGGER.debug(
      `Log level configured to: ${logLevel}, format: ${format}, non-interactive: ${nonInteractive}`
    );
  })
  .addCommand(makeRunCommand())
  .addCommand(makeArgsCommand())
  .addCommand(makeSchemaCommand());

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    // argv[1] is not a file, e.g. under a REPL
    return false;
  }
}

if (isMainModule()) {
  await rootCommand.parseAsync(process.argv);
}
