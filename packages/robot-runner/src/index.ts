#!/usr/bin/env node
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { createProgram } from "./program.js";

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
