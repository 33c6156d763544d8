#!/usr/bin/env npx tsx
/**
 * End-to-end test script for robot-runner.
 *
 * Needs a Java runtime and network access for the first ROBOT download.
 *
 * Usage:
 *   npm run build && npx tsx scripts/e2e-test.ts
 */

import { spawnSync } from "child_process";
import { existsSync, mkdirSync, readFileSync, rmSync, statSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const CLI_PATH = join(__dirname, "../dist/index.js");
const FIXTURES = join(__dirname, "fixtures");
const TEST_DIR = join(__dirname, "../.e2e-test");

// Colors for output
const colors = {
  reset: "\x1b[0m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  dim: "\x1b[2m",
};

function log(message: string, color = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

function logStep(step: string) {
  console.log(`\n${colors.cyan}━━━ ${step} ━━━${colors.reset}`);
}

interface TestResult {
  name: string;
  passed: boolean;
  skipped?: boolean;
}

const results: TestResult[] = [];

interface CommandResult {
  status: number;
  stdout: string;
  stderr: string;
}

function runCommand(args: string[]): CommandResult {
  const result = spawnSync(process.execPath, [CLI_PATH, ...args], {
    encoding: "utf-8",
    env: { ...process.env, ROBOT_RUNNER_NON_INTERACTIVE: "1" },
    timeout: 300_000,
  });
  if (result.error) {
    throw result.error;
  }
  return {
    status: result.status ?? 1,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}

function parseJson(text: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Expected a JSON object, got: ${text.slice(0, 200)}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function test(name: string, fn: () => { passed: boolean; message?: string }): void {
  let passed: boolean;
  let message: string | undefined;
  try {
    ({ passed, message } = fn());
  } catch (error) {
    passed = false;
    message = error instanceof Error ? error.message : String(error);
  }

  results.push({ name, passed });
  log(`${passed ? "✓" : "✗"} ${name}`, passed ? colors.green : colors.red);
  if (message) log(`  ${message}`, colors.dim);
}

function skip(name: string, reason: string): void {
  results.push({ name, passed: true, skipped: true });
  log(`⊘ ${name} (skipped: ${reason})`, colors.yellow);
}

// ============================================================================
// Tests
// ============================================================================

function testHelp(): void {
  logStep("Help");

  test("--help lists the commands", () => {
    const { status, stdout } = runCommand(["--help"]);
    return {
      passed: status === 0 && ["convert", "doctor", "jar", "config"].every((c) => stdout.includes(c)),
    };
  });

  test("--version shows a version", () => {
    const { status, stdout } = runCommand(["--version"]);
    return { passed: status === 0 && /\d+\.\d+\.\d+/.test(stdout), message: stdout.trim() };
  });
}

function testDoctor(): boolean {
  logStep("Availability");

  let available = false;
  test("doctor --json reports availability", () => {
    const { stdout } = runCommand(["doctor", "--json"]);
    const output = parseJson(stdout);
    const data = output.data;
    available =
      typeof data === "object" && data !== null && "available" in data && data.available === true;
    return { passed: output.success === true, message: `available: ${available}` };
  });

  test("jar path prints a cached jar", () => {
    const { status, stdout } = runCommand(["jar", "path"]);
    const path = stdout.trim();
    return { passed: status === 0 && existsSync(path), message: path };
  });

  return available;
}

function testConvert(available: boolean): void {
  logStep("Convert");

  const owl = join(TEST_DIR, "well-formed.owl");
  const obo = join(TEST_DIR, "no-ontology-id.obo");
  const malformed = join(FIXTURES, "no-ontology-id.ofn");

  if (!available) {
    skip("convert OBO to OWL", "ROBOT is not available");
    skip("OBO structure check rejects a malformed ontology", "ROBOT is not available");
    skip("--no-check writes the malformed ontology", "ROBOT is not available");
    return;
  }

  test("convert OBO to OWL", () => {
    const { status, stderr } = runCommand(["convert", join(FIXTURES, "well-formed.obo"), owl]);
    const written = existsSync(owl) && statSync(owl).size > 0;
    return {
      passed: status === 0 && written && readFileSync(owl, "utf-8").includes("EX_0000003"),
      message: status === 0 ? owl : stderr.trim(),
    };
  });

  test("OBO structure check rejects a malformed ontology", () => {
    const { status, stderr } = runCommand(["--json", "convert", malformed, obo]);
    const error = parseJson(stderr).error;
    const code = typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
    return { passed: status === 1 && code === "ROBOT_COMMAND_FAILED", message: String(code) };
  });

  test("--no-check writes the malformed ontology", () => {
    const { status } = runCommand(["convert", malformed, obo, "--no-check"]);
    return {
      passed:
        status === 0 && existsSync(obo) && readFileSync(obo, "utf-8").includes("Example Trait Ontology"),
    };
  });
}

function testErrors(): void {
  logStep("Error Handling");

  test("missing input fails with FILE_NOT_FOUND", () => {
    const { status, stderr } = runCommand(["--json", "convert", join(TEST_DIR, "nope.obo"), "x.owl"]);
    const error = parseJson(stderr).error;
    return {
      passed:
        status === 1 && typeof error === "object" && error !== null && "code" in error && error.code === "FILE_NOT_FOUND",
    };
  });

  test("--remote with --local is rejected", () => {
    const { status, stderr } = runCommand(["convert", "a.owl", "b.obo", "--remote", "--local"]);
    return { passed: status === 1 && stderr.includes("can't be used together") };
  });
}

// ============================================================================
// Main
// ============================================================================

function main(): void {
  logStep("Setup");
  if (!existsSync(CLI_PATH)) {
    log("✗ CLI not built. Run 'npm run build' first.", colors.red);
    process.exit(1);
  }
  mkdirSync(TEST_DIR, { recursive: true });

  try {
    testHelp();
    testErrors();
    testConvert(testDoctor());
  } finally {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }

  logStep("Summary");
  const failed = results.filter((r) => !r.passed);
  const skipped = results.filter((r) => r.skipped);
  log(
    `${results.length - failed.length - skipped.length} passed, ${failed.length} failed, ${skipped.length} skipped`,
    failed.length > 0 ? colors.red : colors.green
  );

  if (failed.length > 0) {
    process.exit(1);
  }
}

main();
