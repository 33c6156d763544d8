import Conf from "conf";
import type { CachedJar, JarManifest } from "../ports/jar-manifest.js";

interface ManifestData {
  jars: Record<string, CachedJar>;
}

/**
 * Jar manifest persisted in the user's config directory.
 * The backing file is only opened on first use.
 */
export function createConfJarManifest(options: { cwd?: string } = {}): JarManifest {
  let conf: Conf<ManifestData> | undefined;

  function store(): Conf<ManifestData> {
    conf ??= new Conf<ManifestData>({
      projectName: "robot-runner",
      configName: "jar-manifest",
      cwd: options.cwd,
      defaults: { jars: {} },
    });
    return conf;
  }

  return {
    list(): CachedJar[] {
      return Object.values(store().get("jars")).sort((a, b) =>
        a.downloadedAt.localeCompare(b.downloadedAt)
      );
    },

    record(entry: CachedJar): void {
      const jars = store().get("jars");
      store().set("jars", { ...jars, [entry.version]: entry });
    },
  };
}
