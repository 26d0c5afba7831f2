import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      host: "0.0.0.0",
      databaseUrl: undefined,
      databaseName: undefined,
      logLevel: "info",
      lifecycleStepMs: 2000,
    });
  });

  it("reads every supported variable", () => {
    const config = loadConfig({
      PORT: "9000",
      HOST: "127.0.0.1",
      DATABASE_URL: "mongodb://localhost:27017/forge",
      DATABASE_NAME: "forge_dev",
      FORGE_LOG_LEVEL: "debug",
      FORGE_LIFECYCLE_STEP_MS: "5",
    });

    expect(config).toEqual({
      port: 9000,
      host: "127.0.0.1",
      databaseUrl: "mongodb://localhost:27017/forge",
      databaseName: "forge_dev",
      logLevel: "debug",
      lifecycleStepMs: 5,
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ PORT: "", DATABASE_URL: "   ", FORGE_LOG_LEVEL: "" });
    expect(config.port).toBe(8000);
    expect(config.databaseUrl).toBeUndefined();
    expect(config.logLevel).toBe("info");
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/home/test", PATH: "/usr/bin" }).port).toBe(8000);
  });

  it.each([
    ["PORT", "abc"],
    ["PORT", "70000"],
    ["FORGE_LOG_LEVEL", "loud"],
    ["FORGE_LIFECYCLE_STEP_MS", "-1"],
  ])("rejects %s=%s", (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ConfigError);
  });

  it("names the offending variable in the error", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/PORT/);
  });
});
