import { readFileSync } from "fs";

let cached: string | undefined;

/**
 * Version of this package, read from its package.json.
 * Resolves the same relative path from src/lib and dist/lib.
 */
export function getCliVersion(): string {
  if (cached === undefined) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
    );
    cached =
      typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string"
        ? raw.version
        : "0.0.0";
  }
  return cached;
}
