// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { CLI_LOGGER } from "../logger/index.js";

import {
  buildCommandFromOptions,
  defaultLauncher,
  formatVector,
  type LaunchOptions,
} from "./_utils/build-command.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";

interface RunOptions extends LaunchOptions {
  dryRun?: boolean;
}

/**
 * Creates the `run` command, which starts a program inside firejail and
 * exits with its exit code
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeRunCommand() {
  return new Command("run")
    .description("Run a program inside a firejail sandbox")
    .argument("<program>", "Program to run inside the sandbox")
    .argument("[args...]", "Arguments for the program")
    .option("-p, --profile-file <path>", "Jail profile (.json, .yaml, .toml)")
    .option("--launcher <path>", "Launcher binary", defaultLauncher())
    .option("-C, --cwd <dir>", "Working directory for the launcher")
    .option("--dry-run", "Print the invocation instead of running it")
    .passThroughOptions()
    .addHelpText(
      "after",
      `
Examples:
  jailrun run -p browser.yaml firefox
  jailrun run --dry-run -- ls -la /tmp
      `
    )
    .action(
      withErrorHandling(
        async (program: string, args: string[], options: RunOptions) => {
          const command = await buildCommandFromOptions(program, args, options);

          if (options.dryRun) {
            // eslint-disable-next-line no-console
            console.log(formatVector(command));
            return;
          }

          const { child } = await command.spawn();
          CLI_LOGGER.debug(
            `Sandbox started with pid ${child.pid ?? "unknown"}`
          );

          const result = await child;
          if (result.signal) {
            CLI_LOGGER.warn(`${program} was terminated by ${result.signal}`);
          }
          process.exitCode = result.exitCode ?? 1;
        }
      )
    );
}
