export type { Clock } from "./clock.js";
export type { DownloadService } from "./download.js";
export type { ProcessRunner, ProcessResult, RunProcessOptions } from "./process-runner.js";
export type { CommandLocator } from "./command-locator.js";
export type { JarManifest, CachedJar } from "./jar-manifest.js";
