import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";
import { outputError } from "../json-output.js";

const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

/**
 * Render an error as indented, colored lines.
 */
export function formatStaticError(error: CLIError): string[] {
  const output: string[] = [""];

  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`);

  if (error.details) {
    output.push("");
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(`${SYM.prompt} ${error.example}`)}`);
  }

  if (error.docs) {
    output.push("");
    output.push(`  ${chalk.dim("Docs:")} ${chalk.blue.underline(error.docs)}`);
  }

  output.push("");
  return output;
}

/**
 * Render an error to stderr based on the current output mode.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  if ((mode ?? getOutputMode()) === "json") {
    outputError(error);
    return;
  }

  for (const line of formatStaticError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  if (isCLIError(error)) {
    renderError(error, mode);
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  renderError(new CLIError("UNKNOWN_ERROR", message, { cause: error }), mode);
}
