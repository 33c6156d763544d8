// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** `-i` reads a local file, `-I` lets ROBOT fetch an IRI */
export type InputFlag = "-i" | "-I";

export type PipelineStage = "merge" | "reason" | "convert";

/** Parameters for a ROBOT conversion */
export interface ConversionRequest {
  /** Local file path or IRI. URL objects are treated as local locators. */
  input: string | URL;
  /** Destination file; ROBOT infers the format from its extension unless `format` is set */
  output: string;
  /** Overrides remote/local inference from `input` */
  inputFlag?: InputFlag;
  /** Squash all imported graphs together before converting */
  merge?: boolean;
  /** Run the reasoner before converting */
  reason?: boolean;
  /** Explicit output format, e.g. "ttl" or "obo" */
  format?: string;
  /**
   * The OBO writer enforces document structure rules by default.
   * Set to false to write ontologies that violate them.
   */
  check?: boolean;
  /** Passed through verbatim after the output designation */
  extraArgs?: string[];
  /** Adds `-vvv` */
  debug?: boolean;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Prefixes that denote remote resources */
export const REMOTE_PROTOCOLS: readonly string[] = [
  "https://",
  "http://",
  "ftp://",
  "ftps://",
];

/**
 * Stages run before and after the input designation, keyed by `merge,reason`.
 * merge always precedes reason, and convert is always last.
 */
export const PIPELINE_STAGES: Record<
  `${boolean},${boolean}`,
  { head: PipelineStage; tail: PipelineStage[] }
> = {
  "false,false": { head: "convert", tail: [] },
  "true,false": { head: "merge", tail: ["convert"] },
  "false,true": { head: "reason", tail: ["convert"] },
  "true,true": { head: "merge", tail: ["reason", "convert"] },
};

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function isRemote(input: string | URL): boolean {
  return (
    typeof input === "string" &&
    REMOTE_PROTOCOLS.some((protocol) => input.startsWith(protocol))
  );
}

export function inferInputFlag(input: string | URL): InputFlag {
  return isRemote(input) ? "-I" : "-i";
}

/**
 * Build the argument list for a ROBOT conversion pipeline.
 * The jar invocation prefix is not included.
 */
export function buildConvertCommand(request: ConversionRequest): string[] {
  const flag = request.inputFlag ?? inferInputFlag(request.input);
  const input = String(request.input);
  const key = `${request.merge ?? false},${request.reason ?? false}` as const;
  const { head, tail } = PIPELINE_STAGES[key];

  const args: string[] = [head, flag, input, ...tail];

  args.push("-o", request.output);
  if (request.extraArgs) {
    args.push(...request.extraArgs);
  }
  if (request.check === false) {
    args.push("--check=false");
  }
  if (request.format) {
    args.push("--format", request.format);
  }
  if (request.debug) {
    args.push("-vvv");
  }

  return args;
}
