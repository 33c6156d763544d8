/**
 * Error codes for CLI-facing failures.
 */
export type ErrorCode =
  // Runtime errors
  | "JAVA_NOT_FOUND"
  | "ROBOT_COMMAND_FAILED"
  | "JAR_DOWNLOAD_FAILED"
  // File errors
  | "FILE_NOT_FOUND"
  | "FILE_IS_DIRECTORY"
  // Validation errors
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Error with a stable code and hints for the person at the terminal.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly docs?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      docs?: string;
      details?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.docs = options?.docs;
    this.details = options?.details;
  }
}

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
