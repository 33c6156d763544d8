import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { maybeOutputJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# robot-runner configuration
# Place at ~/.config/robot-runner/config.yaml (user) or
# /etc/robot-runner/config.yaml (system)
#
# Precedence (highest to lowest):
# 1. CLI flags
# 2. ROBOT_RUNNER_* environment variables
# 3. User config
# 4. System config
# 5. Built-in defaults

robot:
  # ROBOT release to download and run (ROBOT_RUNNER_VERSION)
  version: "1.9.8"

  # Where jars are cached, as <cacheDir>/<version>/robot.jar (ROBOT_RUNNER_HOME)
  # cacheDir: "~/.data/robot"

  # Download location; {version} is replaced with the release
  # urlTemplate: "https://github.com/ontodev/robot/releases/download/v{version}/robot.jar"

java:
  # Java launcher used as: <launcher> -jar robot.jar ... (ROBOT_RUNNER_JAVA)
  launcher: java

logging:
  # Log level: debug, info, warn, error (ROBOT_RUNNER_LOG_LEVEL)
  level: info

  # Output JSON logs
  json: false
`;

function globalConfigPath(command: Command): string | undefined {
  return command.optsWithGlobals<{ config?: string }>().config;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage robot-runner configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/robot-runner/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(`Failed to create config: ${reason}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .action((_options: unknown, command: Command) => {
      const explicit = globalConfigPath(command);
      const pathsToCheck = explicit
        ? [explicit]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (explicit) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          console.error(chalk.red(`  ✗ Invalid: ${reason}`));
          hasErrors = true;
        }
      }

      if (hasErrors) {
        process.exitCode = 1;
      } else if (!foundAny) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'robot-runner config init' to create one.`));
      } else {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .action((_options: unknown, command: Command) => {
      let loaded: ReturnType<typeof loadConfig>;
      try {
        loaded = loadConfig(globalConfigPath(command));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(`Failed to load config: ${reason}`));
        process.exitCode = 1;
        return;
      }

      const { config: resolved, sources } = loaded;
      if (maybeOutputJson({ effective: resolved, sources })) {
        return;
      }

      console.log(chalk.cyan("Effective Configuration:"));
      console.log(chalk.gray("─".repeat(40)));
      console.log(
        chalk.gray(
          sources.length > 0 ? `Sources: ${sources.join(", ")}` : "Sources: (defaults only)"
        )
      );

      console.log();
      console.log(chalk.bold("ROBOT:"));
      console.log(`  version:        ${resolved.robotVersion}`);
      console.log(`  cacheDir:       ${resolved.cacheDir}`);
      console.log(`  urlTemplate:    ${resolved.urlTemplate}`);

      console.log();
      console.log(chalk.bold("Java:"));
      console.log(`  launcher:       ${resolved.launcher}`);

      console.log();
      console.log(chalk.bold("Logging:"));
      console.log(`  level:          ${resolved.logLevel}`);
      console.log(`  json:           ${resolved.logJson}`);
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
