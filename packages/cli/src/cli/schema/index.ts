// pattern: Imperative Shell

import { Command, Option } from "@commander-js/extra-typings";
import YAML from "yaml";

import { JailProfileV1 } from "../../config/types/v1/index.js";

/**
 * Render a TypeBox schema in the requested format
 */
export function renderSchema(schema: object, format: "json" | "yaml"): string {
  return format === "json"
    ? JSON.stringify(schema, null, 2)
    : YAML.stringify(schema);
}

/**
 * Creates the `schema` command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeSchemaCommand() {
  return new Command("schema")
    .description("Output the JSON schema for jail profile files")
    .addOption(
      new Option("-f, --format <format>", "Output format")
        .choices(["json", "yaml"] as const)
        .default("json" as const)
    )
    .addHelpText(
      "after",
      `
Examples:
  jailrun schema                  Output the jail profile schema as JSON
  jailrun schema --format yaml    Output it as YAML
      `
    )
    .action(options => {
      // eslint-disable-next-line no-console
      console.log(renderSchema(JailProfileV1, options.format));
    });
}
