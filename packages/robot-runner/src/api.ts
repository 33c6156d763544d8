export {
  createRobot,
  resolveJarPath,
  isAvailable,
  runRobot,
  convert,
  type Robot,
  type RobotOptions,
} from "./lib/robot/robot.js";
export {
  buildConvertCommand,
  inferInputFlag,
  isRemote,
  REMOTE_PROTOCOLS,
  PIPELINE_STAGES,
  type ConversionRequest,
  type InputFlag,
  type PipelineStage,
} from "./lib/robot/command.js";
export { buildInvocation, invokeRobot, type InvokeRobotOptions } from "./lib/robot/invoker.js";
export {
  createJarResolver,
  ROBOT_VERSION,
  ROBOT_JAR_URL_TEMPLATE,
  DEFAULT_CACHE_DIR,
  type JarResolver,
  type JarResolverOptions,
} from "./lib/robot/jar.js";
export {
  checkAvailability,
  type AvailabilityReport,
  type AvailabilityCheck,
  type AvailabilityCheckName,
} from "./lib/robot/availability.js";
export {
  RobotError,
  isRobotError,
  shortenPreview,
  DEFAULT_PREVIEW_LENGTH,
  type RobotErrorOptions,
} from "./lib/errors/robot-error.js";
export { createLogger, createNoopLogger, type Logger, type LogLevel } from "./lib/logger.js";
export type {
  ProcessRunner,
  ProcessResult,
  DownloadService,
  JarManifest,
  CachedJar,
  CommandLocator,
  Clock,
} from "./lib/ports/index.js";
