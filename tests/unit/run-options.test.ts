import { describe, it, expect } from "vitest";
import { DEFAULT_RUN_OPTIONS, resolveDataDir, resolveRunOptions, type RunOptionsEnv } from "../../src/domain/run-options";
import { ConfigError } from "../../src/core/errors";

const noEnv: RunOptionsEnv = {
  POST_COUNT: undefined,
  MAX_SCROLL_ATTEMPTS: undefined,
  SCROLL_SETTLE_MS: undefined,
  STALL_THRESHOLD: undefined,
  DATA_DIR: undefined,
  WRITE_MODE: undefined,
};

describe("resolveRunOptions", () => {
  it("should fall back to defaults", () => {
    expect(resolveRunOptions({}, noEnv)).toEqual(DEFAULT_RUN_OPTIONS);
  });

  it("should prefer CLI values over environment values", () => {
    const options = resolveRunOptions(
      { postCount: "5", dataDir: "/tmp/cli" },
      { ...noEnv, POST_COUNT: "25", DATA_DIR: "/tmp/env", WRITE_MODE: "merge" }
    );

    expect(options.postCount).toBe(5);
    expect(options.dataDir).toBe("/tmp/cli");
    expect(options.writeMode).toBe("merge");
  });

  it("should skip empty environment values", () => {
    expect(resolveRunOptions({}, { ...noEnv, POST_COUNT: "" }).postCount).toBe(10);
  });

  it("should reject a zero post count", () => {
    expect(() => resolveRunOptions({ postCount: "0" }, noEnv)).toThrow(ConfigError);
  });

  it("should name every invalid field", () => {
    expect(() => resolveRunOptions({ postCount: "abc", stallThreshold: 0 }, { ...noEnv, WRITE_MODE: "append" })).toThrow(
      /postCount: .*; stallThreshold: .*; writeMode: /
    );
  });
});

describe("resolveDataDir", () => {
  it("should ignore invalid values of unrelated options", () => {
    expect(() => resolveRunOptions({}, { ...noEnv, MAX_SCROLL_ATTEMPTS: "lots" })).toThrow(ConfigError);
    expect(resolveDataDir(undefined, { DATA_DIR: "/tmp/env" })).toBe("/tmp/env");
  });

  it("should prefer the flag and fall back to the default", () => {
    expect(resolveDataDir("/tmp/cli", { DATA_DIR: "/tmp/env" })).toBe("/tmp/cli");
    expect(resolveDataDir(undefined, { DATA_DIR: undefined })).toBe("./data/posts");
  });

  it("should reject a blank directory", () => {
    expect(() => resolveDataDir("   ", { DATA_DIR: undefined })).toThrow(ConfigError);
  });
});
