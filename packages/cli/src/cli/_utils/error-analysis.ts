// pattern: Functional Core

import {
  ConfigurationError,
  FileSystemError,
  JailrunError,
  LaunchError,
  ValidationError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category:
    | "filesystem"
    | "process"
    | "validation"
    | "configuration"
    | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

const KNOWN_CATEGORIES: readonly AnalyzedError["category"][] = [
  "filesystem",
  "process",
  "validation",
  "configuration",
];

function toCategory(category: string): AnalyzedError["category"] {
  return KNOWN_CATEGORIES.find(known => known === category) ?? "unknown";
}

/**
 * Analyzes an error and provides structured information with user-friendly messages
 *
 * Typed jailrun errors keep their own message; anything else is matched on
 * well-known system error codes.
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof JailrunError) {
    const errorMessage = error.message;

    if (error instanceof FileSystemError) {
      const suggestions = [
        "Verify the file or directory path exists",
        "Check that you have the necessary permissions",
      ];
      if (error.operation === "read") {
        suggestions.push("Ensure the file exists and is readable");
      }

      return {
        category: "filesystem",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
      };
    }

    if (error instanceof LaunchError) {
      let suggestions = [
        "Check that firejail is installed and runs on this system",
        "Run with --log-level debug to see the full launcher command",
      ];
      if (error.stream) {
        const needed =
          error.stream === "stdin"
            ? "a readable file"
            : "a path in a writable directory";
        suggestions = [
          `Check the ${error.stream} redirection: it must name ${needed}`,
        ];
      } else if (error.code === "ENOENT") {
        suggestions = [
          `Install firejail, or point --launcher at it (tried: ${error.launcher})`,
          "Check that the launcher is on your PATH",
        ];
      } else if (error.code === "EACCES") {
        suggestions = [`Make sure ${error.launcher} is executable`];
      }

      return {
        category: "process",
        userMessage: errorMessage,
        technicalMessage: error.code
          ? `${errorMessage} (${error.code})`
          : errorMessage,
        suggestions,
      };
    }

    if (error instanceof ValidationError) {
      const suggestions = [
        "Check your jail profile against `jailrun schema`",
      ];
      if (error.validationErrors && error.validationErrors.length > 0) {
        suggestions.push(...error.validationErrors.map(e => `- ${e}`));
      }

      return {
        category: "validation",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
      };
    }

    if (error instanceof ConfigurationError) {
      let suggestions = [
        "Check your jail profile file for errors",
        "Run with --log-level debug for more detailed information",
      ];
      if (errorMessage.toLowerCase().includes("unsupported file format")) {
        suggestions = ["Rename the profile to .json, .yaml, .yml or .toml"];
      }

      return {
        category: "configuration",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
      };
    }

    return {
      category: toCategory(error.category),
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions: [
        "Check the error message for details",
        "Run with --log-level debug for more information",
      ],
    };
  }

  // Fall back to string-based analysis for foreign errors
  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  if (
    errorString.includes("eacces") ||
    errorString.includes("permission denied")
  ) {
    return {
      category: "filesystem",
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Check the permissions of the profile file and working directory",
        "Verify the file or directory ownership is correct",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: [
        "Verify the file or directory path exists",
        "Check that firejail is installed",
      ],
    };
  }

  if (errorString.includes("eperm")) {
    return {
      category: "process",
      userMessage: "Operation not permitted",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that firejail is installed setuid or that user namespaces are enabled",
      ],
    };
  }

  return {
    category: "unknown",
    userMessage: errorMessage,
    technicalMessage: errorMessage,
    suggestions: ["Run with --log-level debug for more information"],
  };
}

/**
 * Extracts a message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

/**
 * Exit status for a failed command. A launcher that is missing or not
 * executable exits like a shell would (127, 126); everything else exits 1.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof LaunchError && !error.stream) {
    if (error.code === "ENOENT") {
      return 127;
    }
    if (error.code === "EACCES") {
      return 126;
    }
  }
  return 1;
}
