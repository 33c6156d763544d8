/**
 * Doctor command - checks that Java and ROBOT can actually run here.
 */

import { Command } from "commander";
import chalk from "chalk";
import os from "os";
import type { RuntimeFactory } from "../lib/runtime.js";
import { createSpinner } from "../lib/spinner.js";
import { maybeOutputJson, type DoctorResultJson } from "../lib/json-output.js";
import { getCliVersion } from "../lib/version.js";
import type { AvailabilityCheckName } from "../lib/robot/availability.js";

const CHECK_LABELS: Record<AvailabilityCheckName, string> = {
  "launcher-on-path": "Java on PATH",
  "launcher-runs": "Java runtime",
  "jar-present": "ROBOT jar",
  "robot-runs": "ROBOT",
};

const CHECK_ORDER: AvailabilityCheckName[] = [
  "launcher-on-path",
  "launcher-runs",
  "jar-present",
  "robot-runs",
];

export function registerDoctorCommand(program: Command, getRuntime: RuntimeFactory): void {
  program
    .command("doctor")
    .description("Check that Java and ROBOT are available")
    .option("--verbose", "Show system information")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("What it checks, in order:")}
  ${chalk.yellow("•")} The Java launcher is on the PATH
  ${chalk.yellow("•")} java --help runs
  ${chalk.yellow("•")} The ROBOT jar is cached (downloading it if needed)
  ${chalk.yellow("•")} ROBOT --help runs

${chalk.bold.cyan("Examples:")}
  robot-runner doctor           ${chalk.gray("Run all checks")}
  robot-runner doctor --json    ${chalk.gray("Output as JSON for scripting")}
`
    )
    .action(async (options: { verbose?: boolean }) => {
      await runDoctor(getRuntime, options.verbose ?? false);
    });
}

async function runDoctor(getRuntime: RuntimeFactory, verbose: boolean): Promise<void> {
  const { robot } = getRuntime();
  const spinner = createSpinner("Running diagnostics...").start();
  const report = await robot.checkAvailability();
  spinner.stop();

  if (!report.available) {
    process.exitCode = 1;
  }

  const result: DoctorResultJson = {
    available: report.available,
    checks: report.checks,
    system: {
      os: `${os.platform()} ${os.release()}`,
      nodeVersion: process.version,
      cliVersion: getCliVersion(),
    },
    robot: {
      version: robot.version,
      launcher: robot.launcher,
      ...(report.launcherPath && { launcherPath: report.launcherPath }),
      ...(report.jarPath && { jarPath: report.jarPath }),
    },
  };

  if (maybeOutputJson(result)) {
    return;
  }

  console.log("");
  console.log(chalk.bold.cyan("Diagnostics Report"));
  console.log(chalk.dim("─".repeat(50)));

  const ran = new Set(report.checks.map((c) => c.name));
  for (const check of report.checks) {
    const icon = check.ok ? chalk.green("✓") : chalk.red("✗");
    console.log(`${icon} ${chalk.bold(CHECK_LABELS[check.name])}: ${check.message}`);
  }
  for (const name of CHECK_ORDER) {
    if (!ran.has(name)) {
      console.log(chalk.dim(`- ${CHECK_LABELS[name]}: skipped`));
    }
  }

  if (verbose) {
    console.log("");
    console.log(chalk.dim("─".repeat(50)));
    console.log(chalk.bold("System Information:"));
    console.log(`  OS: ${result.system.os}`);
    console.log(`  Node.js: ${result.system.nodeVersion}`);
    console.log(`  CLI: v${result.system.cliVersion}`);
    console.log(`  ROBOT: ${robot.version}`);
  }

  console.log("");
  if (report.available) {
    console.log(chalk.green("✓ ROBOT is available"));
  } else {
    console.log(chalk.red("✗ ROBOT is not available"));
  }
}
