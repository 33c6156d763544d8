/** A ROBOT jar that has been downloaded into the cache. */
export interface CachedJar {
  version: string;
  url: string;
  path: string;
  sizeBytes: number;
  /** ISO 8601 */
  downloadedAt: string;
}

/**
 * Persistent record of downloaded jars.
 */
export interface JarManifest {
  list(): CachedJar[];
  record(entry: CachedJar): void;
}
