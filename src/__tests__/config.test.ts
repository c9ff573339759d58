import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const clearEnv = () => {
  const keys = [
    "HOST",
    "PORT",
    "LOG_LEVEL",
    "PROVIDER_TIMEOUT_MS",
    "PROVIDER_MAX_RETRIES",
    "PROVIDER_RETRY_DELAY_MS",
  ];
  for (const key of keys) {
    delete process.env[key];
  }
};

const loadConfig = async () => {
  const module = await import("../config.js");
  return module.config;
};

describe("config", () => {
  const originalArgv = process.argv;

  beforeEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
    process.argv = [...originalArgv];
  });

  afterEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
    process.argv = originalArgv;
  });

  it("listens on 0.0.0.0:5000 by default", async () => {
    const cfg = await loadConfig();
    expect(cfg.rest.host).toBe("0.0.0.0");
    expect(cfg.rest.port).toBe(5000);
  });

  it("bounds upstream calls by default", async () => {
    const cfg = await loadConfig();
    expect(cfg.provider).toEqual({ timeoutMs: 8000, maxRetries: 2, retryDelayMs: 500 });
  });

  it("reads HOST and PORT from the environment", async () => {
    vi.stubEnv("HOST", "127.0.0.1");
    vi.stubEnv("PORT", "8080");
    const cfg = await loadConfig();
    expect(cfg.rest.host).toBe("127.0.0.1");
    expect(cfg.rest.port).toBe(8080);
  });

  it("reads provider settings from the environment", async () => {
    vi.stubEnv("PROVIDER_TIMEOUT_MS", "2500");
    vi.stubEnv("PROVIDER_MAX_RETRIES", "0");
    vi.stubEnv("PROVIDER_RETRY_DELAY_MS", "100");
    const cfg = await loadConfig();
    expect(cfg.provider).toEqual({ timeoutMs: 2500, maxRetries: 0, retryDelayMs: 100 });
  });

  it("lets --host and --port override the environment", async () => {
    vi.stubEnv("PORT", "8080");
    process.argv = [...originalArgv, "--host", "localhost", "--port", "7001"];
    const cfg = await loadConfig();
    expect(cfg.rest.host).toBe("localhost");
    expect(cfg.rest.port).toBe(7001);
  });

  it("ignores a flag with no value", async () => {
    process.argv = [...originalArgv, "--port", "--debug"];
    const cfg = await loadConfig();
    expect(cfg.rest.port).toBe(5000);
  });

  it("uses LOG_LEVEL, or debug when --debug is passed", async () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    let cfg = await loadConfig();
    expect(cfg.log).toEqual({ level: "warn", debug: false });

    vi.resetModules();
    process.argv = [...originalArgv, "--debug"];
    cfg = await loadConfig();
    expect(cfg.log).toEqual({ level: "debug", debug: true });
  });
});
