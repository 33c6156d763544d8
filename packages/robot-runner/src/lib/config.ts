import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import {
  DEFAULT_CACHE_DIR,
  ROBOT_JAR_URL_TEMPLATE,
  ROBOT_VERSION,
} from "./robot/jar.js";
import { isLogLevel, type LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/robot-runner/config.yaml";

/** User-level configuration path, under the XDG config home */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "robot-runner",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  robotVersion: ROBOT_VERSION,
  urlTemplate: ROBOT_JAR_URL_TEMPLATE,
  cacheDir: DEFAULT_CACHE_DIR,
  launcher: "java",
  logLevel: "info",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const VersionSchema = z
  .string()
  .regex(/^[0-9A-Za-z][0-9A-Za-z._-]*$/, "must be a release number such as 1.9.8");

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  robot: z
    .object({
      version: VersionSchema.optional(),
      urlTemplate: z
        .string()
        .url()
        .refine((v) => v.includes("{version}"), "must contain {version}")
        .optional(),
      cacheDir: z.string().min(1).optional(),
    })
    .optional(),
  java: z
    .object({
      launcher: z.string().min(1).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  robotVersion: string;
  urlTemplate: string;
  cacheDir: string;
  launcher: string;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/** Expand a leading `~` to the user's home directory. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws with the offending keys if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new Error(`Cannot read config file ${path}: ${String(err)}`, {
      cause: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid YAML in ${path}: ${reason}`, { cause: err });
  }

  // Empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Config validation failed for ${path}:\n${issues}`);
  }

  return result.data;
}

/**
 * Overrides from ROBOT_RUNNER_* environment variables.
 * Values that are empty or out of range are ignored.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<ResolvedConfig> {
  const config: Partial<ResolvedConfig> = {};

  if (env.ROBOT_RUNNER_VERSION && VersionSchema.safeParse(env.ROBOT_RUNNER_VERSION).success) {
    config.robotVersion = env.ROBOT_RUNNER_VERSION;
  }
  if (env.ROBOT_RUNNER_JAVA) {
    config.launcher = env.ROBOT_RUNNER_JAVA;
  }
  if (env.ROBOT_RUNNER_HOME) {
    config.cacheDir = expandHome(env.ROBOT_RUNNER_HOME);
  }
  if (isLogLevel(env.ROBOT_RUNNER_LOG_LEVEL)) {
    config.logLevel = env.ROBOT_RUNNER_LOG_LEVEL;
  }

  return config;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.robot?.version !== undefined) {
    target.robotVersion = source.robot.version;
  }
  if (source.robot?.urlTemplate !== undefined) {
    target.urlTemplate = source.robot.urlTemplate;
  }
  if (source.robot?.cacheDir !== undefined) {
    target.cacheDir = expandHome(source.robot.cacheDir);
  }
  if (source.java?.launcher !== undefined) {
    target.launcher = source.java.launcher;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

function filterUndefined(obj: Partial<ResolvedConfig>): Partial<ResolvedConfig> {
  const result: Partial<ResolvedConfig> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > environment > user config > system config > defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  envConfig: Partial<ResolvedConfig> = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    robotVersion: CONFIG_DEFAULTS.robotVersion,
    urlTemplate: CONFIG_DEFAULTS.urlTemplate,
    cacheDir: CONFIG_DEFAULTS.cacheDir,
    launcher: CONFIG_DEFAULTS.launcher,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(envConfig));
  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Config file named on the command line; replaces the
 *   system and user files
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw new Error(`Config file not found: ${explicitPath}`);
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig, configFromEnv(env));

  return { config, sources };
}
