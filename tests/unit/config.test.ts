import { describe, expect, it } from "vitest";
import { InvalidConfigError } from "../../src/core/errors/app-error.js";
import {
  createConfigProvider,
  loadConfig,
  parseConfig,
  retryPolicyFromConfig,
} from "../../src/infrastructure/config/config.js";

describe("Config", () => {
  it("an empty environment yields the defaults", () => {
    const config = loadConfig({});
    expect(config.env).toBe("production");
    expect(config.log).toEqual({ level: "info", format: "json" });
    expect(config.retry).toEqual({
      maxAttempts: 3,
      backoffBaseMs: 100,
      backoffMultiplier: 2,
      retriableStatusCodes: [408, 429, 500, 502, 503, 504],
    });
    expect(config.rateLimit).toEqual({ maxOperations: 500, windowMs: 1_000 });
    expect(config.circuitBreaker).toEqual({
      failureThreshold: 5,
      recoveryTimeoutMs: 45_000,
      halfOpenMaxProbes: 1,
    });
    expect(config.cache.defaultTtlSeconds).toBe(300);
    expect(config.memory.limitMb).toBe(128);
    expect(config.network.baseUrl).toBeUndefined();
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      NODE_ENV: "development",
      LOG_LEVEL: "DEBUG",
      LOG_FORMAT: "pretty",
      RETRY_MAX_ATTEMPTS: "5",
      RETRY_STATUS_CODES: "502, 503",
      CB_RECOVERY_TIMEOUT_MS: "20000",
      AWS_LAMBDA_FUNCTION_MEMORY_SIZE: "512",
      HOME_ASSISTANT_URL: "http://ha.local:8123",
    });
    expect(config.env).toBe("development");
    expect(config.log).toEqual({ level: "debug", format: "pretty" });
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.retry.retriableStatusCodes).toEqual([502, 503]);
    expect(config.circuitBreaker.recoveryTimeoutMs).toBe(20_000);
    expect(config.memory.limitMb).toBe(512);
    expect(config.network.baseUrl).toBe("http://ha.local:8123");
  });

  it("MEMORY_LIMIT_MB wins over the host memory size", () => {
    const config = loadConfig({ MEMORY_LIMIT_MB: "256", AWS_LAMBDA_FUNCTION_MEMORY_SIZE: "512" });
    expect(config.memory.limitMb).toBe(256);
  });

  it("collects every invalid setting by path", () => {
    const result = parseConfig({
      RETRY_MAX_ATTEMPTS: "11",
      CB_RECOVERY_TIMEOUT_MS: "5000",
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("ValidationError");
    expect(result.error.details).toEqual({
      issues: {
        "retry.maxAttempts": ["Number must be less than or equal to 10"],
        "circuitBreaker.recoveryTimeoutMs": ["Number must be greater than or equal to 20000"],
      },
    });
  });

  it("rejects a default TTL above the maximum", () => {
    const result = parseConfig({ CACHE_TTL: "7200", CACHE_MAX_TTL: "3600" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.details).toEqual({
        issues: { "cache.defaultTtlSeconds": ["Default TTL must not exceed the maximum TTL"] },
      });
    }
  });

  it("rejects pressure thresholds out of order", () => {
    const result = parseConfig({ CACHE_PRESSURE_ELEVATED: "0.9" });
    expect(result.ok).toBe(false);
  });

  it("loadConfig throws InvalidConfigError", () => {
    expect(() => loadConfig({ RATE_LIMIT_MAX_OPERATIONS: "0" })).toThrow(InvalidConfigError);
  });

  it("builds a retry policy from config", () => {
    const policy = retryPolicyFromConfig(loadConfig({ RETRY_STATUS_CODES: "503" }).retry);
    expect(policy.retriableStatusCodes.has(503)).toBe(true);
    expect(policy.retriableStatusCodes.has(500)).toBe(false);
    expect(Object.isFrozen(policy)).toBe(true);
  });
});

describe("Config provider", () => {
  const provider = createConfigProvider(loadConfig({}));

  it("looks up dotted paths", () => {
    expect(provider.get("retry.maxAttempts")).toEqual({ ok: true, value: 3 });
    expect(provider.get("rateLimit")).toEqual({ ok: true, value: { maxOperations: 500, windowMs: 1_000 } });
  });

  it("reports unknown keys", () => {
    const result = provider.get("retry.jitter");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Unknown configuration key: retry.jitter");
      expect(result.error.details).toEqual({ key: "retry.jitter" });
    }
  });
});
