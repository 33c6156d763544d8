import { execa, ExecaError } from "execa";
import type { ProcessRunner } from "../ports/process-runner.js";

/**
 * Process runner backed by execa.
 * Output is decoded as UTF-8 and kept byte-for-byte, trailing newline included.
 */
export function createExecaRunner(): ProcessRunner {
  return {
    async run(file, args, options = {}) {
      const result = await execa(file, args, {
        cwd: options.cwd,
        reject: false,
        stripFinalNewline: false,
      });

      // Never started (ENOENT, EACCES): surface the spawn error itself
      if (result instanceof ExecaError && result.exitCode === undefined && !result.isTerminated) {
        throw result;
      }

      let stderr = result.stderr;
      if (result.exitCode === undefined && result.signal && !stderr) {
        stderr = `terminated by ${result.signal}`;
      }

      return {
        exitCode: result.exitCode ?? 1,
        stdout: result.stdout,
        stderr,
        signal: result.signal,
      };
    },
  };
}
