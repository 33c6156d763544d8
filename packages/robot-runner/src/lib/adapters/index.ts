export { systemClock } from "./system-clock.js";
export { createFetchDownloadService } from "./fetch-download.js";
export { createExecaRunner } from "./execa-runner.js";
export { createPathLocator } from "./path-locator.js";
export { createConfJarManifest } from "./conf-manifest.js";
