import { describe, it, expect } from "vitest";
import { validateConfig } from "../config-validator.js";
import type { AppConfig } from "../config.js";

function makeConfig(overrides: {
  rest?: Partial<AppConfig["rest"]>;
  provider?: Partial<AppConfig["provider"]>;
  log?: Partial<AppConfig["log"]>;
} = {}): AppConfig {
  return {
    rest: { host: "0.0.0.0", port: 5000, ...overrides.rest },
    provider: { timeoutMs: 8000, maxRetries: 2, retryDelayMs: 500, ...overrides.provider },
    log: { level: "info", debug: false, ...overrides.log },
  };
}

describe("validateConfig", () => {
  it("should pass validation for a valid config", () => {
    const result = validateConfig(makeConfig());
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("should return error for invalid REST port (too low)", () => {
    const result = validateConfig(makeConfig({ rest: { port: 0 } }));
    expect(result.errors).toContain("REST port must be between 1 and 65535, got 0");
  });

  it("should return error for invalid REST port (too high)", () => {
    const result = validateConfig(makeConfig({ rest: { port: 65536 } }));
    expect(result.errors).toContain("REST port must be between 1 and 65535, got 65536");
  });

  it("should return error for a non-numeric port", () => {
    const result = validateConfig(makeConfig({ rest: { port: NaN } }));
    expect(result.errors).toContain("REST port must be between 1 and 65535, got NaN");
  });

  it("should return error for an empty host", () => {
    const result = validateConfig(makeConfig({ rest: { host: "" } }));
    expect(result.errors).toContain("REST host is required");
  });

  it("should return error for a non-positive provider timeout", () => {
    const result = validateConfig(makeConfig({ provider: { timeoutMs: 0 } }));
    expect(result.errors).toContain("provider.timeoutMs must be positive, got 0");
  });

  it("should warn for a provider timeout over a minute", () => {
    const result = validateConfig(makeConfig({ provider: { timeoutMs: 90_000 } }));
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual(["provider.timeoutMs is 90000ms — requests may hang for over a minute"]);
  });

  it("should return error for negative retries", () => {
    const result = validateConfig(makeConfig({ provider: { maxRetries: -1 } }));
    expect(result.errors).toContain("provider.maxRetries must be a non-negative integer, got -1");
  });

  it("should accept zero retries", () => {
    const result = validateConfig(makeConfig({ provider: { maxRetries: 0 } }));
    expect(result.errors).toEqual([]);
  });

  it("should warn for more than 5 retries", () => {
    const result = validateConfig(makeConfig({ provider: { maxRetries: 8 } }));
    expect(result.warnings).toContain("provider.maxRetries is 8 (recommended: at most 5)");
  });

  it("should return error for a negative retry delay", () => {
    const result = validateConfig(makeConfig({ provider: { retryDelayMs: -5 } }));
    expect(result.errors).toContain("provider.retryDelayMs must be a non-negative integer, got -5");
  });

  it("should return error for an unknown log level", () => {
    const result = validateConfig(makeConfig({ log: { level: "verbose" } }));
    expect(result.errors).toContain(
      "log.level must be one of fatal, error, warn, info, debug, trace, silent, got verbose",
    );
  });

  it("should collect multiple errors at once", () => {
    const result = validateConfig(makeConfig({ rest: { port: 0 }, provider: { timeoutMs: -1 } }));
    expect(result.errors).toHaveLength(2);
  });
});
