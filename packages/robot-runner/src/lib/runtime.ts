import { loadConfig, type ResolvedConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { isJsonMode } from "./cli-context.js";
import { configInvalid } from "./errors/catalog.js";
import { createRobot, type Robot } from "./robot/robot.js";

/** Everything a command needs, built from the effective configuration. */
export interface Runtime {
  config: ResolvedConfig;
  sources: string[];
  logger: Logger;
  robot: Robot;
}

export type RuntimeFactory = (overrides?: Partial<ResolvedConfig>) => Runtime;

export function createRobotFromConfig(config: ResolvedConfig, logger: Logger): Robot {
  return createRobot({
    version: config.robotVersion,
    launcher: config.launcher,
    cacheDir: config.cacheDir,
    urlTemplate: config.urlTemplate,
    logger,
  });
}

/**
 * Build a runtime factory bound to a config file getter.
 * The config path is read lazily because commander parses it after
 * commands are registered.
 */
export function createRuntimeFactory(getConfigPath: () => string | undefined): RuntimeFactory {
  return (overrides = {}) => {
    let loaded: ReturnType<typeof loadConfig>;
    try {
      loaded = loadConfig(getConfigPath(), overrides);
    } catch (error) {
      throw configInvalid(error instanceof Error ? error.message : String(error), error);
    }

    const { config, sources } = loaded;
    // ROBOT output and JSON envelopes own stdout
    const logger = createLogger({
      level: config.logLevel,
      json: config.logJson || isJsonMode(),
      stderrOnly: true,
    });

    return { config, sources, logger, robot: createRobotFromConfig(config, logger) };
  };
}
