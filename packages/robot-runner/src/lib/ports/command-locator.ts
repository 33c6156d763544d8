/**
 * Abstraction for finding executables on the search path.
 */
export interface CommandLocator {
  /** Absolute path of the executable, or undefined when it cannot be found */
  find(command: string): string | undefined;
}
