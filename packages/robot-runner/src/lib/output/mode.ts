/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "tty" | "static" | "json";

/**
 * Flags that belong to robot-runner itself. Anything after a bare `--` is
 * passed to ROBOT and must not change our own behaviour.
 */
export function ownArgs(argv: string[]): string[] {
  const end = argv.indexOf("--");
  return end === -1 ? argv : argv.slice(0, end);
}

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tty`: Interactive terminal with colors and spinners
 * - `static`: Plain text output (for CI, pipes, non-interactive)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): OutputMode {
  if (ownArgs(argv).includes("--json")) {
    return "json";
  }

  if (env.CI || env.ROBOT_RUNNER_NON_INTERACTIVE) {
    return "static";
  }

  if (!process.stdout.isTTY || env.TERM === "dumb") {
    return "static";
  }

  return "tty";
}
