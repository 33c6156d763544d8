import { accessSync, statSync, constants } from "fs";
import { delimiter, isAbsolute, join, sep } from "path";
import type { CommandLocator } from "../ports/command-locator.js";

function isExecutableFile(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate commands the way a shell does: explicit paths are checked directly,
 * bare names are searched for in each PATH entry (honouring PATHEXT on Windows).
 */
export function createPathLocator(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): CommandLocator {
  const extensions =
    platform === "win32"
      ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM").split(";").filter(Boolean)]
      : [""];

  return {
    find(command: string): string | undefined {
      if (isAbsolute(command) || command.includes(sep) || command.includes("/")) {
        return isExecutableFile(command) ? command : undefined;
      }

      const dirs = (env.PATH ?? "").split(delimiter).filter(Boolean);
      for (const dir of dirs) {
        for (const ext of extensions) {
          const candidate = join(dir, command + ext);
          if (isExecutableFile(candidate)) {
            return candidate;
          }
        }
      }
      return undefined;
    },
  };
}
