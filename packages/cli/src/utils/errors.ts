// pattern: Functional Core

/**
 * Base class for jailrun application errors
 * Subclasses carry a category used by the CLI error analysis
 */
export abstract class JailrunError extends Error {
  public readonly category: string;

  protected constructor(
    category: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to profile files and CLI configuration
 */
export class ConfigurationError extends JailrunError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/**
 * Errors related to file system operations
 */
export class FileSystemError extends JailrunError {
  public readonly operation?: string;
  public readonly filePath?: string;

  constructor(
    message: string,
    operation?: string,
    filePath?: string,
    cause?: unknown
  ) {
    super("filesystem", message, { cause });
    if (operation) {
      this.operation = operation;
    }
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * The launcher could not be started, or was asked to start twice.
 * `cause` holds the operating system error when there is one.
 */
export class LaunchError extends JailrunError {
  public readonly launcher: string;
  public readonly code?: string;
  /** Set when the failure was opening this stream's file redirection */
  public readonly stream?: "stdin" | "stdout" | "stderr";

  constructor(
    message: string,
    launcher: string,
    cause?: unknown,
    stream?: "stdin" | "stdout" | "stderr"
  ) {
    super("process", message, { cause });
    this.launcher = launcher;
    const code = errorCode(cause);
    if (code) {
      this.code = code;
    }
    if (stream) {
      this.stream = stream;
    }
  }
}

/**
 * Errors related to validation failures
 */
export class ValidationError extends JailrunError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * Read the `code` of a Node system error (ENOENT, EACCES, ...)
 */
export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
