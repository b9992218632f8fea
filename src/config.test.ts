import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      maxSteps: 2000,
      timeoutMs: 3000,
      memoryMb: 256,
      logLevel: "info",
      port: 8000,
      host: "127.0.0.1",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({ TRACER_MAX_STEPS: "50", TRACER_TIMEOUT_MS: "750", PORT: "0", TRACER_LOG_LEVEL: "debug" });

    expect(config.maxSteps).toBe(50);
    expect(config.timeoutMs).toBe(750);
    expect(config.port).toBe(0);
    expect(config.logLevel).toBe("debug");
  });

  it("names the variable that is invalid", () => {
    expect(() => loadConfig({ TRACER_MAX_STEPS: "lots" })).toThrow(ConfigError);
    expect(() => loadConfig({ TRACER_MAX_STEPS: "lots" })).toThrow(/^Invalid TRACER_MAX_STEPS: /);
    expect(() => loadConfig({ TRACER_LOG_LEVEL: "loud" })).toThrow(/^Invalid TRACER_LOG_LEVEL: /);
    expect(() => loadConfig({ TRACER_MEMORY_MB: "4" })).toThrow(/^Invalid TRACER_MEMORY_MB: /);
  });
});
