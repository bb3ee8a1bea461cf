// pattern: Imperative Shell

import { applyJailProfile } from "../../config/apply.js";
import { loadJailProfileFile } from "../../config/loaders/jail-profile-loader.js";
import { createFirejailCommand, DEFAULT_LAUNCHER } from "../../firejail/index.js";
import { CLI_LOGGER } from "../../logger/index.js";

import type { FirejailCommand } from "../../firejail/index.js";

export interface LaunchOptions {
  profileFile?: string;
  launcher?: string;
  cwd?: string;
}

/**
 * Launcher to use when --launcher is not given
 */
export function defaultLauncher(): string {
  return process.env["JAILRUN_LAUNCHER"] || DEFAULT_LAUNCHER;
}

/**
 * Build a command for `program` from CLI options and an optional profile file
 */
export async function buildCommandFromOptions(
  program: string,
  args: string[],
  options: LaunchOptions
): Promise<FirejailCommand> {
  const command = createFirejailCommand(program, CLI_LOGGER).args(args);

  if (options.profileFile) {
    CLI_LOGGER.debug(`Loading jail profile from ${options.profileFile}`);
    applyJailProfile(command, await loadJailProfileFile(options.profileFile));
  }
  if (options.launcher) {
    command.launcherPath(options.launcher);
  }
  if (options.cwd) {
    command.currentDir(options.cwd);
  }

  return command;
}

/**
 * The full launcher invocation, one entry per line
 */
export function formatVector(command: FirejailCommand): string {
  return [command.getLauncher(), ...command.launcherArgs()].join("\n");
}
