import { statSync } from "fs";
import type { ProcessRunner } from "../ports/process-runner.js";
import type { DownloadService } from "../ports/download.js";
import type { JarManifest, CachedJar } from "../ports/jar-manifest.js";
import type { CommandLocator } from "../ports/command-locator.js";
import type { Clock } from "../ports/clock.js";
import {
  createExecaRunner,
  createFetchDownloadService,
  createConfJarManifest,
  createPathLocator,
  systemClock,
} from "../adapters/index.js";
import { createLogger, type Logger } from "../logger.js";
import { buildConvertCommand, type ConversionRequest } from "./command.js";
import { invokeRobot } from "./invoker.js";
import {
  createJarResolver,
  DEFAULT_CACHE_DIR,
  ROBOT_JAR_URL_TEMPLATE,
  ROBOT_VERSION,
} from "./jar.js";
import { checkAvailability, type AvailabilityReport } from "./availability.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RobotOptions {
  /** ROBOT release to run (default: ROBOT_VERSION) */
  version?: string;
  /** Java launcher (default: "java") */
  launcher?: string;
  /** Root of the jar cache (default: ~/.data/robot) */
  cacheDir?: string;
  /** Download URL with a `{version}` placeholder */
  urlTemplate?: string;
  /** Working directory for ROBOT processes */
  cwd?: string;
  /** Characters of stdout/stderr kept in RobotError messages */
  previewLength?: number;
  /** Defaults to warnings and errors on stderr */
  logger?: Logger;
  runner?: ProcessRunner;
  download?: DownloadService;
  manifest?: JarManifest;
  locator?: CommandLocator;
  clock?: Clock;
}

export interface Robot {
  readonly version: string;
  readonly launcher: string;
  getJarUrl(version?: string): string;
  resolveJarPath(version?: string): Promise<string>;
  listCachedJars(): CachedJar[];
  isAvailable(): Promise<boolean>;
  checkAvailability(): Promise<AvailabilityReport>;
  /**
   * Run ROBOT with the given arguments and return its standard output.
   * @throws RobotError on a non-zero exit status
   */
  run(args: string[]): Promise<string>;
  /**
   * Convert an ontology with ROBOT.
   * @throws RobotError on a non-zero exit status
   */
  convert(request: ConversionRequest): Promise<string>;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

export function createRobot(options: RobotOptions = {}): Robot {
  const version = options.version ?? ROBOT_VERSION;
  const launcher = options.launcher ?? "java";
  const logger = options.logger ?? createLogger({ level: "warn", json: false });
  const runner = options.runner ?? createExecaRunner();

  const jars = createJarResolver({
    cacheDir: options.cacheDir ?? DEFAULT_CACHE_DIR,
    urlTemplate: options.urlTemplate ?? ROBOT_JAR_URL_TEMPLATE,
    defaultVersion: version,
    download: options.download ?? createFetchDownloadService(),
    manifest: options.manifest ?? createConfJarManifest(),
    clock: options.clock ?? systemClock,
    logger,
  });

  async function run(args: string[]): Promise<string> {
    const jarPath = await jars.resolveJarPath();
    return invokeRobot(args, {
      jarPath,
      launcher,
      runner,
      logger,
      cwd: options.cwd,
      previewLength: options.previewLength,
    });
  }

  function probe(): Promise<AvailabilityReport> {
    return checkAvailability({
      launcher,
      locator: options.locator ?? createPathLocator(),
      runner,
      resolveJarPath: () => jars.resolveJarPath(),
      isFile,
      runRobot: run,
      logger,
    });
  }

  return {
    version,
    launcher,
    getJarUrl: (v) => jars.getJarUrl(v),
    resolveJarPath: (v) => jars.resolveJarPath(v),
    listCachedJars: () => jars.listCachedJars(),
    checkAvailability: probe,
    async isAvailable() {
      return (await probe()).available;
    },
    run,
    convert: (request) => run(buildConvertCommand(request)),
  };
}

// ---------------------------------------------------------------------------
// Default instance
// ---------------------------------------------------------------------------

let defaultRobot: Robot | undefined;

function getDefaultRobot(): Robot {
  defaultRobot ??= createRobot();
  return defaultRobot;
}

/** Ensure the ROBOT jar is cached and return its path. */
export function resolveJarPath(version?: string): Promise<string> {
  return getDefaultRobot().resolveJarPath(version);
}

/** Check if ROBOT is available. Logs the failing step; never throws. */
export function isAvailable(): Promise<boolean> {
  return getDefaultRobot().isAvailable();
}

/** Run a ROBOT command and return its standard output. */
export function runRobot(args: string[]): Promise<string> {
  return getDefaultRobot().run(args);
}

/** Convert an ontology with ROBOT, e.g. OBO to OWL. */
export function convert(request: ConversionRequest): Promise<string> {
  return getDefaultRobot().convert(request);
}
