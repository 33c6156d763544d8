/**
 * Global CLI context for shared options and state.
 */

import { ownArgs } from "./output/mode.js";

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 * Arguments after a bare `--` belong to ROBOT and are ignored.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  const args = ownArgs(argv);
  currentContext = { ...DEFAULT_CONTEXT };

  if (args.includes("--json") || isTruthy(env.ROBOT_RUNNER_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (args.includes("--quiet") || args.includes("-q") || isTruthy(env.ROBOT_RUNNER_QUIET)) {
    currentContext.quiet = true;
  }

  return currentContext;
}

export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
