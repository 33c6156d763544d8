/** Outcome of a finished subprocess. */
export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Signal name when the process was terminated by one */
  signal?: string;
}

export interface RunProcessOptions {
  cwd?: string;
}

/**
 * Abstraction for spawning external programs.
 * Allows testing without launching real processes.
 */
export interface ProcessRunner {
  /**
   * Run a program to completion and capture its output.
   * Resolves for any exit status; rejects only when the program cannot be started.
   */
  run(file: string, args: string[], options?: RunProcessOptions): Promise<ProcessResult>;
}
