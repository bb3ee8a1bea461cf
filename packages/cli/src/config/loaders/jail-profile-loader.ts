// pattern: Functional Core
import { parse as parseToml } from "@iarna/toml";
import { readFile } from "fs/promises";
import { extname } from "path";
import { parse as parseYaml } from "yaml";

import { ajv } from "../../utils/ajv.js";
import {
  ConfigurationError,
  FileSystemError,
  ValidationError,
} from "../../utils/errors.js";
import { JailProfileV1 } from "../types/v1/index.js";

// Compile schema once for reuse
const validateJailProfile = ajv.compile<JailProfileV1>(JailProfileV1);

export const SUPPORTED_PROFILE_EXTENSIONS = [".json", ".yaml", ".yml", ".toml"];

/**
 * Parse profile file content according to the file extension
 */
export function parseJailProfileContent(
  content: string,
  filePath: string
): unknown {
  const ext = extname(filePath).toLowerCase();

  try {
    switch (ext) {
      case ".json":
        return JSON.parse(content);
      case ".yaml":
      case ".yml":
        return parseYaml(content);
      case ".toml":
        return parseToml(content);
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse ${filePath}: ${reason}`);
  }

  throw new ConfigurationError(
    `Unsupported file format: ${ext || "(none)"}. Supported formats: ${SUPPORTED_PROFILE_EXTENSIONS.join(", ")}`
  );
}

/**
 * Validates a JavaScript object against the JailProfileV1 schema
 */
export function validateJailProfileObject(data: unknown): JailProfileV1 {
  if (validateJailProfile(data)) {
    return data;
  }

  const messages = (validateJailProfile.errors ?? []).map(
    err => `${err.instancePath || "root"}: ${err.message ?? "is invalid"}`
  );
  throw new ValidationError(
    `Jail profile validation failed: ${messages.join(", ")}`,
    messages
  );
}

/**
 * Read, parse and validate a jail profile file
 */
export async function loadJailProfileFile(
  filePath: string
): Promise<JailProfileV1> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    throw new FileSystemError(
      `Cannot read jail profile ${filePath}`,
      "read",
      filePath,
      error
    );
  }

  return validateJailProfileObject(parseJailProfileContent(content, filePath));
}
