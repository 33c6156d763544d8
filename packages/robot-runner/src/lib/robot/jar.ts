import { statSync, mkdirSync } from "fs";
import { rename, unlink } from "fs/promises";
import { randomBytes } from "crypto";
import { dirname, join } from "path";
import { homedir } from "os";
import type { DownloadService } from "../ports/download.js";
import type { JarManifest, CachedJar } from "../ports/jar-manifest.js";
import type { Clock } from "../ports/clock.js";
import type { Logger } from "../logger.js";
import { invalidVersion } from "../errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** The ROBOT release downloaded when no version is requested */
export const ROBOT_VERSION = "1.9.8";

export const ROBOT_JAR_URL_TEMPLATE =
  "https://github.com/ontodev/robot/releases/download/v{version}/robot.jar";

export const DEFAULT_CACHE_DIR = join(homedir(), ".data", "robot");

const JAR_FILENAME = "robot.jar";

const VERSION_PATTERN = /^[0-9A-Za-z][0-9A-Za-z._-]*$/;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface JarResolverOptions {
  cacheDir: string;
  urlTemplate: string;
  defaultVersion: string;
  download: DownloadService;
  manifest: JarManifest;
  clock: Clock;
  logger: Logger;
}

export interface JarResolver {
  getJarUrl(version?: string): string;
  getJarPath(version?: string): string;
  /** Path of the cached jar, downloading it first when absent */
  resolveJarPath(version?: string): Promise<string>;
  /** Manifest entries whose jar is still on disk */
  listCachedJars(): CachedJar[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

function fileSize(path: string): number {
  try {
    return statSync(path).size;
  } catch {
    return 0;
  }
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a resolver for ROBOT jars cached under
 * `<cacheDir>/<version>/robot.jar`.
 *
 * Downloads land in a uniquely named `.part` file beside the target and are
 * renamed into place, so concurrent first-time resolutions never expose a
 * partially written jar.
 */
export function createJarResolver(options: JarResolverOptions): JarResolver {
  const logger = options.logger.child({ component: "jar" });

  function checkVersion(version: string | undefined): string {
    const resolved = version ?? options.defaultVersion;
    if (!VERSION_PATTERN.test(resolved)) {
      throw invalidVersion(resolved);
    }
    return resolved;
  }

  function getJarUrl(version?: string): string {
    return options.urlTemplate.replaceAll("{version}", checkVersion(version));
  }

  function getJarPath(version?: string): string {
    return join(options.cacheDir, checkVersion(version), JAR_FILENAME);
  }

  async function resolveJarPath(version?: string): Promise<string> {
    const resolved = checkVersion(version);
    const target = getJarPath(resolved);

    if (isFile(target)) {
      return target;
    }

    const url = getJarUrl(resolved);
    const partial = `${target}.${process.pid}.${randomBytes(4).toString("hex")}.part`;

    mkdirSync(dirname(target), { recursive: true });
    logger.info("Downloading ROBOT", { version: resolved, url, path: target });

    try {
      await options.download.download(url, partial);
      await rename(partial, target);
    } catch (error) {
      await unlink(partial).catch((cleanupError: unknown) => {
        logger.debug("Could not remove partial download", {
          path: partial,
          error: String(cleanupError),
        });
      });
      // A concurrent writer may have renamed its own copy into place first.
      if (isFile(target)) {
        logger.debug("ROBOT was put in place by another download", { path: target });
        return target;
      }
      throw error;
    }

    options.manifest.record({
      version: resolved,
      url,
      path: target,
      sizeBytes: fileSize(target),
      downloadedAt: options.clock.now().toISOString(),
    });

    return target;
  }

  function listCachedJars(): CachedJar[] {
    return options.manifest.list().filter((entry) => isFile(entry.path));
  }

  return { getJarUrl, getJarPath, resolveJarPath, listCachedJars };
}
