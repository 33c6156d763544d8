import type { ProcessRunner } from "../ports/process-runner.js";
import type { Logger } from "../logger.js";
import { RobotError } from "../errors/robot-error.js";

export interface InvokeRobotOptions {
  /** Resolved path of robot.jar */
  jarPath: string;
  runner: ProcessRunner;
  logger: Logger;
  /** Java launcher, default "java" */
  launcher?: string;
  cwd?: string;
  previewLength?: number;
}

/**
 * Build the full process invocation for a ROBOT argument list.
 */
export function buildInvocation(
  launcher: string,
  jarPath: string,
  args: readonly string[]
): string[] {
  return [launcher, "-jar", jarPath, ...args];
}

/**
 * Run ROBOT once and return its standard output.
 * Waits for the process to exit; there is no timeout and no retry.
 *
 * @throws RobotError when ROBOT exits with a non-zero status
 */
export async function invokeRobot(
  args: readonly string[],
  options: InvokeRobotOptions
): Promise<string> {
  const launcher = options.launcher ?? "java";
  const command = buildInvocation(launcher, options.jarPath, args);

  options.logger.debug("Running shell command", { command });

  const result = await options.runner.run(launcher, command.slice(1), {
    cwd: options.cwd,
  });

  if (result.exitCode !== 0) {
    options.logger.debug("ROBOT failed", {
      exitCode: result.exitCode,
      signal: result.signal,
    });
    throw new RobotError(command, result.exitCode, {
      stdout: result.stdout,
      stderr: result.stderr,
      previewLength: options.previewLength,
    });
  }

  return result.stdout;
}
