import type { CommandLocator } from "../ports/command-locator.js";
import type { ProcessRunner } from "../ports/process-runner.js";
import type { Logger } from "../logger.js";

export type AvailabilityCheckName =
  | "launcher-on-path"
  | "launcher-runs"
  | "jar-present"
  | "robot-runs";

export interface AvailabilityCheck {
  name: AvailabilityCheckName;
  ok: boolean;
  message: string;
}

export interface AvailabilityReport {
  available: boolean;
  /** Checks in the order they ran; stops at the first failure */
  checks: AvailabilityCheck[];
  launcherPath?: string;
  jarPath?: string;
}

export interface AvailabilityProbeOptions {
  launcher: string;
  locator: CommandLocator;
  runner: ProcessRunner;
  resolveJarPath(): Promise<string>;
  isFile(path: string): boolean;
  runRobot(args: string[]): Promise<string>;
  logger: Logger;
}

function errorSummary(error: unknown): string {
  return error instanceof Error ? error.message.split("\n")[0] : String(error);
}

/**
 * Check whether ROBOT can run on this machine.
 * Advisory only: every failure is logged and reported, never thrown.
 */
export async function checkAvailability(
  options: AvailabilityProbeOptions
): Promise<AvailabilityReport> {
  const { launcher, logger } = options;
  const report: AvailabilityReport = { available: false, checks: [] };

  function fail(name: AvailabilityCheckName, message: string): AvailabilityReport {
    logger.error(message);
    report.checks.push({ name, ok: false, message });
    return report;
  }

  const launcherPath = options.locator.find(launcher);
  if (!launcherPath) {
    return fail("launcher-on-path", `${launcher} is not on the PATH`);
  }
  report.launcherPath = launcherPath;
  report.checks.push({
    name: "launcher-on-path",
    ok: true,
    message: `Found ${launcher} at ${launcherPath}`,
  });

  try {
    const result = await options.runner.run(launcher, ["--help"]);
    if (result.exitCode !== 0) {
      return fail(
        "launcher-runs",
        `${launcher} --help exited with status ${result.exitCode} - the Java runtime environment (JRE) might not be configured properly`
      );
    }
  } catch (error) {
    return fail(
      "launcher-runs",
      `${launcher} --help failed (${errorSummary(error)}) - the Java runtime environment (JRE) might not be configured properly`
    );
  }
  report.checks.push({
    name: "launcher-runs",
    ok: true,
    message: `${launcher} --help succeeded`,
  });

  let jarPath: string;
  try {
    jarPath = await options.resolveJarPath();
  } catch (error) {
    return fail("jar-present", `ROBOT could not be downloaded: ${errorSummary(error)}`);
  }
  report.jarPath = jarPath;
  if (!options.isFile(jarPath)) {
    return fail("jar-present", `ROBOT was not successfully downloaded to ${jarPath}`);
  }
  report.checks.push({
    name: "jar-present",
    ok: true,
    message: `ROBOT jar at ${jarPath}`,
  });

  try {
    await options.runRobot(["--help"]);
  } catch (error) {
    logger.debug("ROBOT --help failed", { error: errorSummary(error) });
    return fail(
      "robot-runs",
      `ROBOT was downloaded to ${jarPath} but could not be run with --help`
    );
  }
  report.checks.push({
    name: "robot-runs",
    ok: true,
    message: "ROBOT --help succeeded",
  });

  report.available = true;
  return report;
}
