// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import {
  buildCommandFromOptions,
  defaultLauncher,
  formatVector,
  type LaunchOptions,
} from "./_utils/build-command.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";

/**
 * Creates the `args` command, which prints the launcher invocation without running it
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeArgsCommand() {
  return new Command("args")
    .description(
      "Print the firejail invocation for a program, one argument per line"
    )
    .argument("<program>", "Program to run inside the sandbox")
    .argument("[args...]", "Arguments for the program")
    .option("-p, --profile-file <path>", "Jail profile (.json, .yaml, .toml)")
    .option("--launcher <path>", "Launcher binary", defaultLauncher())
    .passThroughOptions()
    .action(
      withErrorHandling(
        async (program: string, args: string[], options: LaunchOptions) => {
          const command = await buildCommandFromOptions(program, args, options);
          // eslint-disable-next-line no-console
          console.log(formatVector(command));
        }
      )
    );
}
