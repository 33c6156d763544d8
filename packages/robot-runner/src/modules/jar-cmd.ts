import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { RuntimeFactory } from "../lib/runtime.js";
import { createSpinner } from "../lib/spinner.js";
import {
  maybeOutputJson,
  type JarListJson,
  type JarPathJson,
} from "../lib/json-output.js";
import { isCLIError } from "../lib/errors/types.js";
import { jarDownloadFailed } from "../lib/errors/catalog.js";

function formatSize(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}

export function registerJarCommands(program: Command, getRuntime: RuntimeFactory): void {
  const jar = program.command("jar").description("Manage cached ROBOT jars");

  jar
    .command("path")
    .description("Print the path of the ROBOT jar, downloading it if needed")
    .option("--robot-version <version>", "ROBOT release to resolve")
    .action(async (options: { robotVersion?: string }) => {
      const { robot } = getRuntime({ robotVersion: options.robotVersion });
      const spinner = createSpinner(`Resolving ROBOT ${robot.version}...`).start();

      let path: string;
      try {
        path = await robot.resolveJarPath();
      } catch (error) {
        spinner.fail(`Couldn't get ROBOT ${robot.version}`);
        throw isCLIError(error) ? error : jarDownloadFailed(robot.version, error);
      }
      spinner.stop();

      const result: JarPathJson = {
        version: robot.version,
        url: robot.getJarUrl(),
        path,
      };
      if (maybeOutputJson(result)) {
        return;
      }

      console.log(path);
    });

  jar
    .command("list")
    .description("List downloaded ROBOT jars")
    .action(() => {
      const { robot } = getRuntime();
      const jars = robot.listCachedJars();

      const result: JarListJson = { jars };
      if (maybeOutputJson(result)) {
        return;
      }

      if (jars.length === 0) {
        console.log(chalk.yellow("No ROBOT jars downloaded yet."));
        console.log(chalk.gray("Run 'robot-runner jar path' to download one."));
        return;
      }

      const table = new CliTable3({
        head: ["Version", "Size", "Downloaded", "Path"],
      });
      for (const entry of jars) {
        table.push([
          entry.version,
          formatSize(entry.sizeBytes),
          entry.downloadedAt.slice(0, 10),
          entry.path,
        ]);
      }
      console.log(table.toString());
    });
}
