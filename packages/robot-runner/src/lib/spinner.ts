/**
 * Spinner wrapper that stays silent in quiet, JSON and non-TTY output.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";
import { getOutputMode } from "./output/mode.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  text: string;
}

class SilentSpinner implements Spinner {
  text = "";

  start(_text?: string): Spinner {
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }
}

class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }
}

export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || isJsonMode() || getOutputMode() !== "tty") {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}
