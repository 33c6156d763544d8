import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

vi.mock("chalk", () => {
  const plain = (s: string) => s;
  return {
    default: {
      red: plain,
      green: plain,
      yellow: plain,
      gray: plain,
      dim: plain,
      bold: Object.assign((s: string) => s, { cyan: plain }),
    },
  };
});

vi.mock("../lib/version.js", () => ({ getCliVersion: () => "0.1.0" }));

import { Command } from "commander";
import { registerDoctorCommand } from "./doctor.js";
import { resolveConfig } from "../lib/config.js";
import { createNoopLogger } from "../lib/logger.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import type { Robot } from "../lib/robot/robot.js";
import type { AvailabilityReport } from "../lib/robot/availability.js";

const JAR = "/cache/1.9.8/robot.jar";

const AVAILABLE: AvailabilityReport = {
  available: true,
  checks: [
    { name: "launcher-on-path", ok: true, message: "/usr/bin/java" },
    { name: "launcher-runs", ok: true, message: "java --help exited 0" },
    { name: "jar-present", ok: true, message: JAR },
    { name: "robot-runs", ok: true, message: "robot --help exited 0" },
  ],
  launcherPath: "/usr/bin/java",
  jarPath: JAR,
};

const NO_JAVA: AvailabilityReport = {
  available: false,
  checks: [{ name: "launcher-on-path", ok: false, message: "java is not on the PATH" }],
};

describe("doctor command", () => {
  let program: Command;
  let checkAvailability: ReturnType<typeof vi.fn>;
  let consoleLogSpy: MockInstance;

  beforeEach(() => {
    checkAvailability = vi.fn().mockResolvedValue(AVAILABLE);
    const robot: Robot = {
      version: "1.9.8",
      launcher: "java",
      getJarUrl: vi.fn(),
      resolveJarPath: vi.fn(),
      listCachedJars: vi.fn(),
      isAvailable: vi.fn(),
      checkAvailability,
      run: vi.fn(),
      convert: vi.fn(),
    };

    program = new Command().option("--json");
    program.exitOverride();
    registerDoctorCommand(program, () => ({
      config: resolveConfig(),
      sources: [],
      logger: createNoopLogger(),
      robot,
    }));

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
  });

  it("lists every check and reports success", async () => {
    await program.parseAsync(["node", "robot-runner", "doctor"]);

    expect(consoleLogSpy).toHaveBeenCalledWith("✓ Java on PATH: /usr/bin/java");
    expect(consoleLogSpy).toHaveBeenCalledWith("✓ ROBOT jar: " + JAR);
    expect(consoleLogSpy).toHaveBeenCalledWith("✓ ROBOT is available");
    expect(process.exitCode).toBeUndefined();
  });

  it("marks checks after the first failure as skipped", async () => {
    checkAvailability.mockResolvedValue(NO_JAVA);

    await program.parseAsync(["node", "robot-runner", "doctor"]);

    expect(consoleLogSpy).toHaveBeenCalledWith("✗ Java on PATH: java is not on the PATH");
    expect(consoleLogSpy).toHaveBeenCalledWith("- Java runtime: skipped");
    expect(consoleLogSpy).toHaveBeenCalledWith("- ROBOT jar: skipped");
    expect(consoleLogSpy).toHaveBeenCalledWith("- ROBOT: skipped");
    expect(consoleLogSpy).toHaveBeenCalledWith("✗ ROBOT is not available");
    expect(process.exitCode).toBe(1);
  });

  it("shows system information with --verbose", async () => {
    await program.parseAsync(["node", "robot-runner", "doctor", "--verbose"]);

    expect(consoleLogSpy).toHaveBeenCalledWith(`  Node.js: ${process.version}`);
    expect(consoleLogSpy).toHaveBeenCalledWith("  CLI: v0.1.0");
    expect(consoleLogSpy).toHaveBeenCalledWith("  ROBOT: 1.9.8");
  });

  it("prints the report as JSON", async () => {
    initContext(["node", "robot-runner", "doctor", "--json"], {});
    checkAvailability.mockResolvedValue(NO_JAVA);

    await program.parseAsync(["node", "robot-runner", "doctor", "--json"]);

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    const output = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
    expect(output.success).toBe(true);
    expect(output.data).toMatchObject({
      available: false,
      checks: NO_JAVA.checks,
      system: { nodeVersion: process.version, cliVersion: "0.1.0" },
      robot: { version: "1.9.8", launcher: "java" },
    });
    expect(output.data.robot).not.toHaveProperty("jarPath");
    expect(process.exitCode).toBe(1);
  });
});
