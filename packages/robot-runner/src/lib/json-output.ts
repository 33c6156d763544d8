/**
 * JSON output utilities for machine-readable CLI output.
 */

import { isJsonMode } from "./cli-context.js";
import { CLIError } from "./errors/types.js";
import { RobotError } from "./errors/robot-error.js";
import type { AvailabilityCheck } from "./robot/availability.js";
import type { CachedJar } from "./ports/jar-manifest.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

export interface JsonError {
  success: false;
  error: {
    code: string;
    message: string;
    suggestion?: string;
    details?: string;
    docs?: string;
    command?: string[];
    returnCode?: number;
  };
}

export type JsonResult<T> = JsonSuccess<T> | JsonError;

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface ConvertResultJson {
  input: string;
  output: string;
  robotVersion: string;
  command: string[];
  stdout: string;
}

export interface DoctorResultJson {
  available: boolean;
  checks: AvailabilityCheck[];
  system: {
    os: string;
    nodeVersion: string;
    cliVersion: string;
  };
  robot: {
    version: string;
    launcher: string;
    launcherPath?: string;
    jarPath?: string;
  };
}

export interface JarPathJson {
  version: string;
  url: string;
  path: string;
}

export interface JarListJson {
  jars: CachedJar[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Build the JSON error envelope for any error.
 * ROBOT failures carry the failed command and its exit status.
 */
export function toJsonError(error: Error): JsonError {
  const robotError =
    error instanceof RobotError
      ? error
      : error.cause instanceof RobotError
        ? error.cause
        : undefined;

  return {
    success: false,
    error: {
      code: error instanceof CLIError ? error.code : "UNKNOWN_ERROR",
      message: error.message,
      ...(error instanceof CLIError && error.suggestion && { suggestion: error.suggestion }),
      ...(error instanceof CLIError && error.details && { details: error.details }),
      ...(error instanceof CLIError && error.docs && { docs: error.docs }),
      ...(robotError && {
        command: [...robotError.command],
        returnCode: robotError.returnCode,
      }),
    },
  };
}

/**
 * Output an error JSON result to stderr.
 */
export function outputError(error: Error): void {
  console.error(JSON.stringify(toJsonError(error), null, 2));
}

/**
 * Output JSON and return true in JSON mode; return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
