import { describe, expect, it } from "vitest";
import { createHealthService } from "../../src/application/services/health.service.js";
import { createTtlCache } from "../../src/infrastructure/cache/ttl-cache.js";
import { createLogger } from "../../src/infrastructure/logging/logger.js";
import { createCircuitBreakerRegistry } from "../../src/infrastructure/resilience/circuit-breaker-registry.js";
import { captureStreams, createFakeClock } from "../helpers/fakes.js";

const setup = () => {
  const clock = createFakeClock();
  const streams = captureStreams();
  let memory = 0.1;
  let cachePressure = 0;
  const cache = createTtlCache(
    {
      defaultTtlSeconds: 60,
      maxTtlSeconds: 3600,
      maxBytes: 10_000,
      maxEntries: 100,
      maxKeyLength: 250,
      pressure: { elevated: 0.75, high: 0.85, critical: 0.95, emergency: 0.98 },
    },
    { clock, memoryProbe: () => cachePressure },
  );
  const breakers = createCircuitBreakerRegistry(
    { failureThreshold: 1, recoveryTimeoutMs: 30_000, halfOpenMaxProbes: 1 },
    clock,
  );
  const health = createHealthService({
    logger: createLogger("debug", {}, "json", streams),
    version: "1.0.0",
    clock,
    memoryProbe: () => memory,
    cache: () => cache,
    breakers: () => breakers,
    uptime: () => 42,
  });
  return {
    health,
    breakers,
    clock,
    streams,
    setMemory: (v: number) => {
      memory = v;
    },
    setCachePressure: (v: number) => {
      cachePressure = v;
    },
  };
};

describe("Health service", () => {
  it("reports ok when every component is healthy", async () => {
    const { health } = setup();

    expect(await health.check()).toEqual({
      status: "ok",
      version: "1.0.0",
      uptime: 42,
      timestamp: "2026-01-01T00:00:00.000Z",
      checks: {
        memory: { status: "ok", details: "10% of limit" },
        cache: { status: "ok", details: "0 entries, pressure normal" },
      },
    });
  });

  it("marks an open breaker as down and degrades the overall status", async () => {
    const { health, breakers, streams } = setup();
    breakers.get("ha.local").recordFailure();
    breakers.get("api.example").recordSuccess();

    const status = await health.check();

    expect(status.status).toBe("degraded");
    expect(status.checks["circuit:ha.local"]).toEqual({
      status: "down",
      details: "Circuit breaker OPEN, failures: 1",
    });
    expect(status.checks["circuit:api.example"]).toEqual({ status: "ok" });
    const warning = JSON.parse((streams.errors[0] ?? "").trim());
    expect(warning.msg).toBe("Health check degraded");
    expect(warning.failedComponents).toEqual(["circuit:ha.local"]);
  });

  it("marks a recovering breaker as degraded", async () => {
    const { health, breakers, clock } = setup();
    breakers.get("ha.local").recordFailure();
    clock.advance(30_000);

    const status = await health.check();

    expect(status.checks["circuit:ha.local"]?.status).toBe("degraded");
  });

  it("grades memory use against the host ceiling", async () => {
    const { health, setMemory } = setup();

    setMemory(0.9);
    expect((await health.check()).checks["memory"]?.status).toBe("degraded");

    setMemory(0.96);
    const status = await health.check();
    expect(status.checks["memory"]).toEqual({ status: "down", details: "96% of limit" });
    expect(status.status).toBe("degraded");
  });

  it("grades cache pressure by stage", async () => {
    const { health, setCachePressure } = setup();

    setCachePressure(0.8);
    expect((await health.check()).checks["cache"]?.status).toBe("ok");

    setCachePressure(0.9);
    expect((await health.check()).checks["cache"]?.status).toBe("degraded");

    setCachePressure(0.99);
    expect((await health.check()).checks["cache"]).toEqual({
      status: "down",
      details: "0 entries, pressure emergency",
    });
  });
});
