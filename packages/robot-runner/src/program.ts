import { Command } from "commander";
import { getCliVersion } from "./lib/version.js";
import { createRuntimeFactory, type RuntimeFactory } from "./lib/runtime.js";
import { registerConvertCommand } from "./modules/convert.js";
import { registerDoctorCommand } from "./modules/doctor.js";
import { registerJarCommands } from "./modules/jar-cmd.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

export function createProgram(runtimeFactory?: RuntimeFactory): Command {
  const program = new Command()
    .name("robot-runner")
    .description("Download and run ROBOT, the OBO ontology tool")
    .version(getCliVersion())
    .option("--json", "Output JSON for scripting")
    .option("-q, --quiet", "Suppress spinners and progress output")
    .option("-c, --config <path>", "Use this config file instead of the user and system ones");

  const getRuntime =
    runtimeFactory ??
    createRuntimeFactory(() => program.opts<{ config?: string }>().config);

  registerConvertCommand(program, getRuntime);
  registerDoctorCommand(program, getRuntime);
  registerJarCommands(program, getRuntime);
  registerConfigCommands(program);

  return program;
}
