export type LogLevel = "debug" | "info" | "warn" | "error";

type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  /** One JSON object per line instead of `[time] LEVEL message {meta}` */
  json: boolean;
  /**
   * Send every level to stderr. The CLI sets this because its stdout carries
   * ROBOT's output and JSON envelopes.
   */
  stderrOnly?: boolean;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(meta: LogMeta): Logger;
}

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in SEVERITY;
}

function formatLine(json: boolean, level: LogLevel, message: string, meta: LogMeta): string {
  const timestamp = new Date().toISOString();
  if (json) {
    return JSON.stringify({ timestamp, level, message, ...meta });
  }
  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${suffix}`;
}

/**
 * Structured logger. Below `warn` it writes to stdout unless `stderrOnly`
 * is set; `warn` and `error` always go to stderr.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = SEVERITY[options.level];

  const emit = (level: LogLevel, message: string, meta: LogMeta): void => {
    if (SEVERITY[level] < threshold) return;
    const line = formatLine(options.json, level, message, meta);
    const toStderr = options.stderrOnly || SEVERITY[level] >= SEVERITY.warn;
    (toStderr ? console.error : console.log)(line);
  };

  const bind = (bound: LogMeta): Logger => ({
    debug: (message, meta) => emit("debug", message, { ...bound, ...meta }),
    info: (message, meta) => emit("info", message, { ...bound, ...meta }),
    warn: (message, meta) => emit("warn", message, { ...bound, ...meta }),
    error: (message, meta) => emit("error", message, { ...bound, ...meta }),
    child: (meta) => bind({ ...bound, ...meta }),
  });

  return bind({});
}

/** Logger that discards everything. */
export function createNoopLogger(): Logger {
  const discard = (): void => {};
  const logger: Logger = {
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
    child: () => logger,
  };
  return logger;
}
