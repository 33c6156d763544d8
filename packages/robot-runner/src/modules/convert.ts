import { Command } from "commander";
import chalk from "chalk";
import { statSync } from "fs";
import type { RuntimeFactory } from "../lib/runtime.js";
import { createSpinner } from "../lib/spinner.js";
import { maybeOutputJson, type ConvertResultJson } from "../lib/json-output.js";
import {
  buildConvertCommand,
  inferInputFlag,
  type ConversionRequest,
  type InputFlag,
} from "../lib/robot/command.js";
import { isRobotError } from "../lib/errors/robot-error.js";
import { isCLIError } from "../lib/errors/types.js";
import {
  conflictingOptions,
  fileIsDirectory,
  fileNotFound,
  jarDownloadFailed,
  javaNotFound,
  optionAsArgument,
  robotCommandFailed,
} from "../lib/errors/catalog.js";

interface ConvertOptions {
  merge?: boolean;
  reason?: boolean;
  format?: string;
  check: boolean;
  debug?: boolean;
  remote?: boolean;
  local?: boolean;
  robotVersion?: string;
}

export function registerConvertCommand(program: Command, getRuntime: RuntimeFactory): void {
  program
    .command("convert")
    .description("Convert an ontology to another format with ROBOT")
    .argument("<input>", "Local ontology file or IRI")
    .argument("<output>", "Destination file (format inferred from its extension)")
    .argument("[robotArgs...]", "Extra ROBOT arguments, after --")
    .allowUnknownOption()
    .option("--merge", "Merge all imported graphs into one first")
    .option("--reason", "Run the reasoner before converting")
    .option("-f, --format <format>", "Explicit output format (obo, owl, ttl, ofn, json...)")
    .option("--no-check", "Don't enforce OBO document structure rules")
    .option("--debug", "Pass -vvv to ROBOT")
    .option("--remote", "Treat <input> as an IRI for ROBOT to fetch")
    .option("--local", "Treat <input> as a local file")
    .option("--robot-version <version>", "ROBOT release to use")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  robot-runner convert go.obo go.owl                   ${chalk.gray("OBO to OWL")}
  robot-runner convert go.owl go.obo --no-check        ${chalk.gray("Skip OBO structure rules")}
  robot-runner convert https://example.org/x.owl x.ttl ${chalk.gray("Remote input, inferred")}
  robot-runner convert in.owl out.owl --merge --reason ${chalk.gray("merge, then reason, then convert")}
  robot-runner convert in.owl out.ofn -- --prefix "ex: http://example.org/"
`
    )
    .action(
      async (input: string, output: string, robotArgs: string[], options: ConvertOptions) => {
        await runConvert(input, output, robotArgs, options, getRuntime);
      }
    );
}

function checkLocalInput(path: string): void {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(path).isDirectory();
  } catch {
    throw fileNotFound(path);
  }
  if (isDirectory) {
    throw fileIsDirectory(path);
  }
}

function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function runConvert(
  input: string,
  output: string,
  robotArgs: string[],
  options: ConvertOptions,
  getRuntime: RuntimeFactory
): Promise<void> {
  // An unknown option ahead of the positionals shifts them into robotArgs.
  if (input.startsWith("-")) {
    throw optionAsArgument("<input>", input);
  }
  if (output.startsWith("-")) {
    throw optionAsArgument("<output>", output);
  }

  if (options.remote && options.local) {
    throw conflictingOptions("--remote", "--local");
  }

  let inputFlag: InputFlag | undefined;
  if (options.remote) inputFlag = "-I";
  if (options.local) inputFlag = "-i";

  if ((inputFlag ?? inferInputFlag(input)) === "-i") {
    checkLocalInput(input);
  }

  const request: ConversionRequest = {
    input,
    output,
    inputFlag,
    merge: options.merge ?? false,
    reason: options.reason ?? false,
    format: options.format,
    check: options.check,
    extraArgs: robotArgs,
    debug: options.debug ?? false,
  };

  const { robot, logger } = getRuntime({ robotVersion: options.robotVersion });
  const spinner = createSpinner(`Resolving ROBOT ${robot.version}...`).start();

  try {
    await robot.resolveJarPath();
  } catch (error) {
    spinner.fail(`Couldn't get ROBOT ${robot.version}`);
    throw isCLIError(error) ? error : jarDownloadFailed(robot.version, error);
  }

  spinner.text = `Converting ${input}...`;
  logger.debug("Converting", { input, output, robotVersion: robot.version });

  let stdout: string;
  try {
    stdout = await robot.convert(request);
  } catch (error) {
    spinner.fail("Conversion failed");
    if (isRobotError(error)) {
      throw robotCommandFailed(error, request.check !== false);
    }
    if (isMissingExecutable(error)) {
      throw javaNotFound(robot.launcher, error);
    }
    throw error;
  }

  spinner.succeed(`Wrote ${output}`);

  const result: ConvertResultJson = {
    input,
    output,
    robotVersion: robot.version,
    command: buildConvertCommand(request),
    stdout,
  };
  if (maybeOutputJson(result)) {
    return;
  }

  if (stdout.trim()) {
    process.stdout.write(stdout);
  }
}
