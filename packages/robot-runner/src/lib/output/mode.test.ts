import { describe, it, expect } from "vitest";
import { getOutputMode, ownArgs } from "./mode.js";

describe("output mode", () => {
  describe("ownArgs", () => {
    it("drops everything from a bare -- onwards", () => {
      expect(ownArgs(["node", "robot-runner", "convert", "a.obo", "b.owl", "--", "--json"])).toEqual([
        "node",
        "robot-runner",
        "convert",
        "a.obo",
        "b.owl",
      ]);
    });

    it("returns the arguments unchanged without --", () => {
      const argv = ["node", "robot-runner", "doctor", "--json"];
      expect(ownArgs(argv)).toBe(argv);
    });
  });

  describe("getOutputMode", () => {
    it("selects json for our own --json flag", () => {
      expect(getOutputMode(["node", "robot-runner", "doctor", "--json"], {})).toBe("json");
    });

    it("ignores --json meant for ROBOT", () => {
      expect(
        getOutputMode(["node", "robot-runner", "convert", "a", "b", "--", "--json"], { CI: "1" })
      ).toBe("static");
    });

    it("is static in CI and non-interactive runs", () => {
      expect(getOutputMode([], { CI: "true" })).toBe("static");
      expect(getOutputMode([], { ROBOT_RUNNER_NON_INTERACTIVE: "1" })).toBe("static");
    });
  });
});
