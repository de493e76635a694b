/**
 * Tests for the configuration layers
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { config, defineConfig, loadConfigFromEnv } from "@pegforge/core";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should expose defaults", () => {
    expect(config.get("memoization.mode")).toBe("all");
    expect(config.get("tokenizer.tabSize")).toBe(8);
    expect(config.get("codegen.runtimeModule")).toBe("@pegforge/runtime");
    expect(config.has("debug")).toBe(false);
  });

  it("should merge programmatic values over defaults", () => {
    config.set({ codegen: { className: "ExprParser" } });
    expect(config.get("codegen.className")).toBe("ExprParser");
    expect(config.get("codegen.runtimeModule")).toBe("@pegforge/runtime");
  });

  it("should return undefined for unknown paths", () => {
    expect(config.get("nope.missing")).toBeUndefined();
  });

  it("should let environment variables override defaults", () => {
    vi.stubEnv("PEGFORGE_MEMOIZATION_MODE", "non-trivial");
    config.reset();
    expect(config.get("memoization.mode")).toBe("non-trivial");
  });

  it("should keep programmatic values across a reload", () => {
    config.set({ memoization: { mode: "hinted" } });
    config.load();
    expect(config.get("memoization.mode")).toBe("hinted");
  });

  it("should read a config file found by search", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pegforge-config-"));
    fs.writeFileSync(path.join(dir, ".pegforgerc.json"), JSON.stringify({ codegen: { className: "CalcParser" } }));
    try {
      config.load(dir);
      expect(config.get("codegen.className")).toBe("CalcParser");
      expect(config.getConfigFilePath()).toBe(path.join(dir, ".pegforgerc.json"));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("defineConfig returns its argument", () => {
    const cfg = { debug: true };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});

describe("loadConfigFromEnv", () => {
  it("should parse prefixed variables into nested config", () => {
    const result = loadConfigFromEnv({
      PEGFORGE_DEBUG: "1",
      PEGFORGE_MEMOIZATION_MODE: "hinted",
      PEGFORGE_TOKENIZER_TABSIZE: "4",
      PEGFORGE_CODEGEN_CLASSNAME: "Calc",
      PEGFORGE_NO_COLOR: "1",
      HOME: "/home/test",
    });
    expect(result).toEqual({
      debug: true,
      memoization: { mode: "hinted" },
      tokenizer: { tabSize: 4 },
      codegen: { className: "Calc" },
    });
  });

  it("should treat 0, false and empty strings as false", () => {
    expect(loadConfigFromEnv({ PEGFORGE_DEBUG: "0", PEGFORGE_VERBOSE: "" })).toEqual({
      debug: false,
      verbose: false,
    });
  });
});
