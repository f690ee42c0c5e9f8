import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      moduleFile: "go.mod",
      ignore: [],
      includeTests: false,
      logLevel: "info",
    });
  });

  it("reads every setting from the environment", () => {
    expect(
      loadConfig({
        IMPORTDEPS_MODULE_FILE: "gop.mod",
        IMPORTDEPS_IGNORE: "gen, third_party ,",
        IMPORTDEPS_INCLUDE_TESTS: "true",
        IMPORTDEPS_LOG_LEVEL: "debug",
      }),
    ).toEqual({
      moduleFile: "gop.mod",
      ignore: ["gen", "third_party"],
      includeTests: true,
      logLevel: "debug",
    });
  });

  it("falls back to info for an unknown log level", () => {
    expect(loadConfig({ IMPORTDEPS_LOG_LEVEL: "verbose" }).logLevel).toBe("info");
  });
});
