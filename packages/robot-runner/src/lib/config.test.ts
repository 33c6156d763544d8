import { describe, it, expect, vi, beforeEach } from "vitest";
import { homedir } from "os";
import { join } from "path";
import {
  resolveConfig,
  loadConfig,
  loadConfigFile,
  configFromEnv,
  expandHome,
  ConfigFileSchema,
  CONFIG_DEFAULTS,
  SYSTEM_CONFIG_PATH,
  USER_CONFIG_PATH,
} from "./config.js";

vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from "fs";

function files(contents: Record<string, string>) {
  vi.mocked(existsSync).mockImplementation(
    (path) => typeof path === "string" && path in contents
  );
  vi.mocked(readFileSync).mockImplementation((path) => {
    if (typeof path === "string" && path in contents) return contents[path];
    throw new Error(`ENOENT: ${String(path)}`);
  });
}

describe("config", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resolveConfig", () => {
    it("returns defaults when nothing is configured", () => {
      expect(resolveConfig()).toEqual({
        robotVersion: "1.9.8",
        urlTemplate: "https://github.com/ontodev/robot/releases/download/v{version}/robot.jar",
        cacheDir: CONFIG_DEFAULTS.cacheDir,
        launcher: "java",
        logLevel: "info",
        logJson: false,
      });
    });

    it("layers system < user < environment < command line", () => {
      const system = { robot: { version: "1.9.0", cacheDir: "/srv/robot" }, java: { launcher: "/usr/lib/jvm/bin/java" } };
      const user = { robot: { version: "1.9.5" } };

      const config = resolveConfig(
        { launcher: "/opt/jdk/bin/java" },
        user,
        system,
        { robotVersion: "1.9.6" }
      );

      expect(config.robotVersion).toBe("1.9.6");
      expect(config.cacheDir).toBe("/srv/robot");
      expect(config.launcher).toBe("/opt/jdk/bin/java");
    });

    it("ignores undefined command line values", () => {
      const config = resolveConfig({ robotVersion: undefined }, { robot: { version: "1.9.5" } });

      expect(config.robotVersion).toBe("1.9.5");
    });

    it("expands ~ in the cache directory", () => {
      const config = resolveConfig({}, { robot: { cacheDir: "~/robots" } });

      expect(config.cacheDir).toBe(join(homedir(), "robots"));
    });

    it("applies logging settings", () => {
      const config = resolveConfig({}, { logging: { level: "debug", json: true } });

      expect(config.logLevel).toBe("debug");
      expect(config.logJson).toBe(true);
    });
  });

  describe("expandHome", () => {
    it("only expands a leading ~", () => {
      expect(expandHome("~")).toBe(homedir());
      expect(expandHome("~/x")).toBe(join(homedir(), "x"));
      expect(expandHome("/tmp/~x")).toBe("/tmp/~x");
    });
  });

  describe("configFromEnv", () => {
    it("reads ROBOT_RUNNER_* variables", () => {
      expect(
        configFromEnv({
          ROBOT_RUNNER_VERSION: "1.9.5",
          ROBOT_RUNNER_JAVA: "/opt/jdk/bin/java",
          ROBOT_RUNNER_HOME: "~/cache",
          ROBOT_RUNNER_LOG_LEVEL: "debug",
        })
      ).toEqual({
        robotVersion: "1.9.5",
        launcher: "/opt/jdk/bin/java",
        cacheDir: join(homedir(), "cache"),
        logLevel: "debug",
      });
    });

    it("ignores empty and invalid values", () => {
      expect(
        configFromEnv({
          ROBOT_RUNNER_VERSION: "../1.9.5",
          ROBOT_RUNNER_JAVA: "",
          ROBOT_RUNNER_LOG_LEVEL: "verbose",
        })
      ).toEqual({});
    });
  });

  describe("ConfigFileSchema", () => {
    it("accepts an empty config", () => {
      expect(ConfigFileSchema.safeParse({}).success).toBe(true);
    });

    it("requires {version} in the URL template", () => {
      expect(
        ConfigFileSchema.safeParse({
          robot: { urlTemplate: "https://mirror.example.org/{version}/robot.jar" },
        }).success
      ).toBe(true);
      expect(
        ConfigFileSchema.safeParse({
          robot: { urlTemplate: "https://mirror.example.org/robot.jar" },
        }).success
      ).toBe(false);
    });

    it("rejects unknown log levels", () => {
      expect(ConfigFileSchema.safeParse({ logging: { level: "verbose" } }).success).toBe(false);
    });
  });

  describe("loadConfigFile", () => {
    it("returns undefined for a missing file", () => {
      files({});

      expect(loadConfigFile("/path/to/config.yaml")).toBeUndefined();
    });

    it("parses a valid file", () => {
      files({
        "/path/to/config.yaml": "robot:\n  version: 1.9.5\njava:\n  launcher: /opt/java\n",
      });

      expect(loadConfigFile("/path/to/config.yaml")).toEqual({
        robot: { version: "1.9.5" },
        java: { launcher: "/opt/java" },
      });
    });

    it("treats an empty file as an empty config", () => {
      files({ "/path/to/config.yaml": "" });

      expect(loadConfigFile("/path/to/config.yaml")).toEqual({});
    });

    it("throws on invalid YAML", () => {
      files({ "/path/to/config.yaml": "robot:\n  version: [1.9.5\n" });

      expect(() => loadConfigFile("/path/to/config.yaml")).toThrow(
        /^Invalid YAML in \/path\/to\/config\.yaml: /
      );
    });

    it("lists the offending keys on validation failure", () => {
      files({ "/path/to/config.yaml": "robot:\n  version: ../1.9.5\n" });

      expect(() => loadConfigFile("/path/to/config.yaml")).toThrow(
        "Config validation failed for /path/to/config.yaml:\n" +
          "  - robot.version: must be a release number such as 1.9.8"
      );
    });
  });

  describe("loadConfig", () => {
    it("reads the system and user files in order", () => {
      files({
        [SYSTEM_CONFIG_PATH]: "robot:\n  version: 1.9.0\n  cacheDir: /srv/robot\n",
        [USER_CONFIG_PATH]: "robot:\n  version: 1.9.5\n",
      });

      const { config, sources } = loadConfig(undefined, {}, {});

      expect(sources).toEqual([SYSTEM_CONFIG_PATH, USER_CONFIG_PATH]);
      expect(config.robotVersion).toBe("1.9.5");
      expect(config.cacheDir).toBe("/srv/robot");
    });

    it("uses only an explicit config file when given", () => {
      files({
        [SYSTEM_CONFIG_PATH]: "robot:\n  cacheDir: /srv/robot\n",
        "/work/robot.yaml": "java:\n  launcher: /opt/java\n",
      });

      const { config, sources } = loadConfig("/work/robot.yaml", {}, {});

      expect(sources).toEqual(["/work/robot.yaml"]);
      expect(config.launcher).toBe("/opt/java");
      expect(config.cacheDir).toBe(CONFIG_DEFAULTS.cacheDir);
    });

    it("throws when an explicit config file is missing", () => {
      files({});

      expect(() => loadConfig("/work/missing.yaml")).toThrow(
        "Config file not found: /work/missing.yaml"
      );
    });

    it("lets the environment override files", () => {
      files({ [USER_CONFIG_PATH]: "robot:\n  version: 1.9.5\n" });

      const { config } = loadConfig(undefined, {}, { ROBOT_RUNNER_VERSION: "1.9.7" });

      expect(config.robotVersion).toBe("1.9.7");
    });
  });
});
