import { describe, it, expect, vi, beforeEach, afterEach, type Mock, type MockInstance } from "vitest";

vi.mock("ora", () => ({
  default: () => ({
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: "",
  }),
}));

vi.mock("fs", async (importOriginal) => ({
  ...(await importOriginal<typeof import("fs")>()),
  statSync: vi.fn(),
}));

vi.mock("../lib/version.js", () => ({ getCliVersion: () => "0.1.0" }));

import { statSync } from "fs";
import { createProgram } from "../program.js";
import { resolveConfig } from "../lib/config.js";
import { createNoopLogger } from "../lib/logger.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { RobotError } from "../lib/errors/robot-error.js";
import { invalidVersion } from "../lib/errors/catalog.js";
import type { Robot } from "../lib/robot/robot.js";
import type { RuntimeFactory } from "../lib/runtime.js";

const JAR = "/cache/1.9.8/robot.jar";

function fakeRobot(): Robot {
  return {
    version: "1.9.8",
    launcher: "java",
    getJarUrl: () => "https://example.org/v1.9.8/robot.jar",
    resolveJarPath: vi.fn().mockResolvedValue(JAR),
    listCachedJars: () => [],
    isAvailable: vi.fn(),
    checkAvailability: vi.fn(),
    run: vi.fn(),
    convert: vi.fn().mockResolvedValue(""),
  };
}

function regularFile() {
  return { isDirectory: () => false } as ReturnType<typeof statSync>;
}

describe("convert command", () => {
  let robot: Robot;
  let getRuntime: Mock<RuntimeFactory>;
  let consoleLogSpy: MockInstance;
  let stdoutSpy: MockInstance;

  async function run(...args: string[]) {
    const program = createProgram(getRuntime).exitOverride();
    await program.parseAsync(["node", "robot-runner", "convert", ...args]);
  }

  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(statSync).mockReturnValue(regularFile());
    robot = fakeRobot();
    getRuntime = vi.fn<RuntimeFactory>(() => ({
      config: resolveConfig(),
      sources: [],
      logger: createNoopLogger(),
      robot,
    }));
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    stdoutSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetContext();
  });

  it("converts a local file with default options", async () => {
    await run("pato.obo", "pato.owl");

    expect(statSync).toHaveBeenCalledWith("pato.obo");
    expect(robot.convert).toHaveBeenCalledWith({
      input: "pato.obo",
      output: "pato.owl",
      inputFlag: undefined,
      merge: false,
      reason: false,
      format: undefined,
      check: true,
      extraArgs: [],
      debug: false,
    });
  });

  it("maps flags onto the conversion request", async () => {
    await run("in.owl", "out.obo", "--merge", "--reason", "-f", "obo", "--no-check", "--debug");

    expect(robot.convert).toHaveBeenCalledWith(
      expect.objectContaining({
        merge: true,
        reason: true,
        format: "obo",
        check: false,
        debug: true,
      })
    );
  });

  it("passes arguments after -- through to ROBOT", async () => {
    await run("in.owl", "out.ofn", "--", "--prefix", "ex: http://example.org/");

    expect(robot.convert).toHaveBeenCalledWith(
      expect.objectContaining({ extraArgs: ["--prefix", "ex: http://example.org/"] })
    );
  });

  it("does not stat remote inputs", async () => {
    await run("https://example.org/pato.owl", "pato.obo");

    expect(statSync).not.toHaveBeenCalled();
    expect(robot.convert).toHaveBeenCalledWith(
      expect.objectContaining({ input: "https://example.org/pato.owl", inputFlag: undefined })
    );
  });

  it("forces the input flag with --remote or --local", async () => {
    await run("ontology-iri", "out.owl", "--remote");
    expect(robot.convert).toHaveBeenLastCalledWith(expect.objectContaining({ inputFlag: "-I" }));
    expect(statSync).not.toHaveBeenCalled();

    await run("https://example.org/x.owl", "out.owl", "--local");
    expect(robot.convert).toHaveBeenLastCalledWith(expect.objectContaining({ inputFlag: "-i" }));
    expect(statSync).toHaveBeenCalledWith("https://example.org/x.owl");
  });

  it("rejects --remote together with --local", async () => {
    await expect(run("x.owl", "y.obo", "--remote", "--local")).rejects.toMatchObject({
      code: "VALIDATION_INVALID_OPTION",
      message: "--remote and --local can't be used together",
    });
    expect(getRuntime).not.toHaveBeenCalled();
  });

  it("reports a missing local input", async () => {
    vi.mocked(statSync).mockImplementation(() => {
      throw new Error("ENOENT");
    });

    await expect(run("missing.obo", "out.owl")).rejects.toMatchObject({
      code: "FILE_NOT_FOUND",
    });
    expect(robot.convert).not.toHaveBeenCalled();
  });

  it("reports a directory input", async () => {
    vi.mocked(statSync).mockReturnValue({ isDirectory: () => true } as ReturnType<typeof statSync>);

    await expect(run("ontologies", "out.owl")).rejects.toMatchObject({
      code: "FILE_IS_DIRECTORY",
    });
  });

  it("uses the requested ROBOT version", async () => {
    await run("pato.obo", "pato.owl", "--robot-version", "1.9.5");

    expect(getRuntime).toHaveBeenCalledWith({ robotVersion: "1.9.5" });
  });

  it("wraps download failures", async () => {
    vi.mocked(robot.resolveJarPath).mockRejectedValue(new Error("404 Not Found"));

    await expect(run("pato.obo", "pato.owl")).rejects.toMatchObject({
      code: "JAR_DOWNLOAD_FAILED",
      details: "404 Not Found",
    });
    expect(robot.convert).not.toHaveBeenCalled();
  });

  it("keeps validation errors from jar resolution", async () => {
    vi.mocked(robot.resolveJarPath).mockRejectedValue(invalidVersion("../x"));

    await expect(run("pato.obo", "pato.owl", "--robot-version", "../x")).rejects.toMatchObject({
      code: "VALIDATION_INVALID_OPTION",
      message: '"../x" is not a valid ROBOT version',
    });
    expect(robot.convert).not.toHaveBeenCalled();
  });

  it("rejects a ROBOT option given before the input and output", async () => {
    await expect(
      run("--annotate-with-source", "true", "pato.owl", "pato.obo")
    ).rejects.toMatchObject({
      code: "VALIDATION_INVALID_OPTION",
      message: '<input> "--annotate-with-source" looks like an option',
      suggestion: "Put options for ROBOT after --",
    });
    expect(statSync).not.toHaveBeenCalled();
    expect(getRuntime).not.toHaveBeenCalled();
  });

  it("rejects an output that looks like an option", async () => {
    await expect(run("pato.owl", "--", "-x")).rejects.toMatchObject({
      code: "VALIDATION_INVALID_OPTION",
      message: '<output> "-x" looks like an option',
    });
  });

  it("passes unknown options after the input and output to ROBOT", async () => {
    await run("pato.owl", "pato.obo", "--annotate-with-source", "true");

    expect(robot.convert).toHaveBeenCalledWith(
      expect.objectContaining({
        input: "pato.owl",
        output: "pato.obo",
        extraArgs: ["--annotate-with-source", "true"],
      })
    );
  });

  it("wraps ROBOT failures with a hint about --no-check", async () => {
    const failure = new RobotError(["java", "-jar", JAR, "convert"], 1, {
      stderr: "OBO STRUCTURE ERROR Ontology does not have an ID",
    });
    vi.mocked(robot.convert).mockRejectedValue(failure);

    await expect(run("pato.owl", "pato.obo")).rejects.toMatchObject({
      code: "ROBOT_COMMAND_FAILED",
      message: "ROBOT exited with status 1",
      details: "OBO STRUCTURE ERROR Ontology does not have an ID",
      suggestion: "If the OBO writer rejected the ontology's structure, retry with --no-check",
      cause: failure,
    });
  });

  it("reports a missing Java launcher", async () => {
    vi.mocked(robot.convert).mockRejectedValue(
      Object.assign(new Error("spawn java ENOENT"), { code: "ENOENT" })
    );

    await expect(run("pato.obo", "pato.owl")).rejects.toMatchObject({
      code: "JAVA_NOT_FOUND",
      message: 'Can\'t run "java"',
    });
  });

  it("echoes ROBOT's standard output", async () => {
    vi.mocked(robot.convert).mockResolvedValue("ROBOT says hi\n");

    await run("pato.obo", "pato.owl");

    expect(stdoutSpy).toHaveBeenCalledWith("ROBOT says hi\n");
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it("prints a JSON result in JSON mode", async () => {
    initContext(["node", "robot-runner", "--json"], {});

    await run("pato.obo", "pato.owl", "--json");

    expect(JSON.parse(consoleLogSpy.mock.calls[0][0] as string)).toEqual({
      success: true,
      data: {
        input: "pato.obo",
        output: "pato.owl",
        robotVersion: "1.9.8",
        command: ["convert", "-i", "pato.obo", "-o", "pato.owl"],
        stdout: "",
      },
    });
  });
});
