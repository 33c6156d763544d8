import { CLIError } from "./types.js";
import type { RobotError } from "./robot-error.js";

const ROBOT_DOCS = "https://robot.obolibrary.org";

// ============================================================================
// Runtime Errors
// ============================================================================

export function javaNotFound(launcher: string, cause?: unknown): CLIError {
  return new CLIError("JAVA_NOT_FOUND", `Can't run "${launcher}"`, {
    suggestion:
      "Install a Java runtime (JRE 11 or newer) or point java.launcher at one",
    example: "robot-runner doctor",
    cause,
  });
}

export function robotCommandFailed(error: RobotError, checked: boolean): CLIError {
  return new CLIError(
    "ROBOT_COMMAND_FAILED",
    `ROBOT exited with status ${error.returnCode}`,
    {
      details: error.stderrPreview,
      suggestion: checked
        ? "If the OBO writer rejected the ontology's structure, retry with --no-check"
        : "Run again with --debug to see ROBOT's full trace",
      docs: ROBOT_DOCS,
      cause: error,
    }
  );
}

export function jarDownloadFailed(version: string, cause: unknown): CLIError {
  return new CLIError(
    "JAR_DOWNLOAD_FAILED",
    `Couldn't download ROBOT ${version}`,
    {
      details: cause instanceof Error ? cause.message : String(cause),
      suggestion: "Check your network connection and that the version exists",
      docs: "https://github.com/ontodev/robot/releases",
      cause,
    }
  );
}

// ============================================================================
// File Errors
// ============================================================================

export function fileNotFound(path: string): CLIError {
  return new CLIError("FILE_NOT_FOUND", `Can't find "${path}"`, {
    suggestion: "Check the file path exists, or pass --remote for an IRI",
  });
}

export function fileIsDirectory(path: string): CLIError {
  return new CLIError("FILE_IS_DIRECTORY", `"${path}" is a directory, not a file`, {
    suggestion: "Provide a path to a specific ontology file",
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidVersion(version: string): CLIError {
  return new CLIError(
    "VALIDATION_INVALID_OPTION",
    `"${version}" is not a valid ROBOT version`,
    {
      suggestion: "Use a release number such as 1.9.8",
    }
  );
}

export function conflictingOptions(a: string, b: string): CLIError {
  return new CLIError(
    "VALIDATION_INVALID_OPTION",
    `${a} and ${b} can't be used together`,
    {
      suggestion: `Pick one of ${a} or ${b}`,
    }
  );
}

export function optionAsArgument(name: string, value: string): CLIError {
  return new CLIError(
    "VALIDATION_INVALID_OPTION",
    `${name} "${value}" looks like an option`,
    {
      suggestion: "Put options for ROBOT after --",
      example: 'robot-runner convert in.owl out.obo -- --annotate-with-source true',
    }
  );
}

export function configInvalid(details: string, cause?: unknown): CLIError {
  return new CLIError("VALIDATION_CONFIG_INVALID", "Configuration is invalid", {
    details,
    example: "robot-runner config validate",
    cause,
  });
}
