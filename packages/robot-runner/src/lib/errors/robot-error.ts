export const DEFAULT_PREVIEW_LENGTH = 500;

const PLACEHOLDER = " [...]";

/**
 * Bound text to `width` characters for display.
 * Text that already fits is returned untouched. Longer text has its
 * whitespace collapsed and is cut at a word boundary, leaving room for
 * the trailing " [...]" marker.
 */
export function shortenPreview(text: string, width = DEFAULT_PREVIEW_LENGTH): string {
  if (text.length <= width) {
    return text;
  }

  const words = text.split(/\s+/).filter(Boolean);
  const collapsed = words.join(" ");
  if (collapsed.length <= width) {
    return collapsed;
  }

  let kept = "";
  for (const word of words) {
    const candidate = kept ? `${kept} ${word}` : word;
    if (candidate.length + PLACEHOLDER.length > width) break;
    kept = candidate;
  }

  return kept ? kept + PLACEHOLDER : PLACEHOLDER.trimStart();
}

function indent(text: string, prefix = "  "): string {
  return text
    .split("\n")
    .map((line) => (line.trim() ? prefix + line : line))
    .join("\n");
}

export interface RobotErrorOptions {
  stdout?: string | null;
  stderr?: string | null;
  /** Maximum characters of each stream shown in the message */
  previewLength?: number;
}

/**
 * Raised when ROBOT exits with a non-zero status.
 * The message carries bounded previews of both output streams.
 */
export class RobotError extends Error {
  readonly command: readonly string[];
  readonly returnCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly previewLength: number;
  readonly stdoutPreview: string;
  readonly stderrPreview: string;

  constructor(command: readonly string[], returnCode: number, options: RobotErrorOptions = {}) {
    const stdout = options.stdout || "<no stdout>";
    const stderr = options.stderr || "<no stderr>";
    const previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH;
    const stdoutPreview = shortenPreview(stdout, previewLength);
    const stderrPreview = shortenPreview(stderr, previewLength);

    super(
      `Command \`${command.join(" ")}\` returned non-zero exit status ${returnCode}.\n\n` +
        `stderr:\n\n${indent(stderrPreview)}` +
        `\n\nstdout:\n\n${indent(stdoutPreview)}`
    );
    this.name = "RobotError";
    this.command = Object.freeze([...command]);
    this.returnCode = returnCode;
    this.stdout = stdout;
    this.stderr = stderr;
    this.previewLength = previewLength;
    this.stdoutPreview = stdoutPreview;
    this.stderrPreview = stderrPreview;
  }
}

export function isRobotError(error: unknown): error is RobotError {
  return error instanceof RobotError;
}
