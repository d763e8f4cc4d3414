import { describe, it, expect, beforeEach, afterAll, vi } from "vitest";

// Mock logger to avoid side effects
vi.mock("../core/logger", () => ({
  log: vi.fn(),
}));

const KNOWN_VARS = ["PORT", "NODE_ENV", "TIMEZONE", "CACHE_TTL_SECONDS", "LOG_LEVEL"];

describe("validateEnvironment", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
    for (const name of KNOWN_VARS) {
      delete process.env[name];
    }
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it("should return valid when all optional vars are missing (all have defaults)", async () => {
    const { validateEnvironment } = await import("../core/env-validation");
    const result = validateEnvironment();

    expect(result.valid).toBe(true);
    expect(result.invalid).toHaveLength(0);
    expect(result.messages).toHaveLength(KNOWN_VARS.length);
  });

  it("should warn only about NODE_ENV when nothing is set", async () => {
    const { validateEnvironment } = await import("../core/env-validation");
    const result = validateEnvironment();

    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toContain("NODE_ENV");
  });

  it("should produce no warnings when all vars are set", async () => {
    process.env.PORT = "3000";
    process.env.NODE_ENV = "production";
    process.env.TIMEZONE = "Europe/Berlin";
    process.env.CACHE_TTL_SECONDS = "25";
    process.env.LOG_LEVEL = "debug";

    const { validateEnvironment } = await import("../core/env-validation");
    const result = validateEnvironment();

    expect(result.valid).toBe(true);
    expect(result.warnings).toHaveLength(0);
    expect(result.messages).toHaveLength(0);
  });

  it("should reject an unknown timezone", async () => {
    process.env.TIMEZONE = "Mars/Olympus";

    const { validateEnvironment } = await import("../core/env-validation");
    const result = validateEnvironment();

    expect(result.valid).toBe(false);
    expect(result.invalid).toEqual(["TIMEZONE=Mars/Olympus – unbekannte Zeitzone"]);
  });

  it("should reject a non-positive cache TTL and an invalid port", async () => {
    process.env.CACHE_TTL_SECONDS = "0";
    process.env.PORT = "70000";

    const { validateEnvironment } = await import("../core/env-validation");
    const result = validateEnvironment();

    expect(result.valid).toBe(false);
    expect(result.invalid).toHaveLength(2);
  });

  it("should log errors for invalid values", async () => {
    process.env.LOG_LEVEL = "verbose";

    const { log } = await import("../core/logger");
    const { validateEnvironment } = await import("../core/env-validation");
    validateEnvironment();

    expect(log).toHaveBeenCalledWith("error", "system", "❌ Ungültige Environment-Variablen:");
  });
});

describe("getAppConfig", () => {
  it("reads values from the given environment", async () => {
    const { getAppConfig } = await import("../core/config");

    expect(getAppConfig({ PORT: "8080", TIMEZONE: "UTC", CACHE_TTL_SECONDS: "1.5", LOG_LEVEL: "trace" })).toEqual({
      port: 8080,
      host: "0.0.0.0",
      timezone: "UTC",
      cacheTtlMs: 1500,
      logLevel: "trace",
    });
  });

  it("falls back to defaults", async () => {
    const { getAppConfig } = await import("../core/config");

    expect(getAppConfig({})).toEqual({
      port: 3000,
      host: "0.0.0.0",
      timezone: "Europe/Berlin",
      cacheTtlMs: 25_000,
      logLevel: "info",
    });
  });
});
