import { describe, expect, it } from "vitest";
import { createMetricsCollector } from "../../src/infrastructure/metrics/prometheus.js";

describe("Metrics collector", () => {
  it("counts by label set", () => {
    const metrics = createMetricsCollector();
    metrics.networkRequestsTotal.inc({ transport: "http", outcome: "success" });
    metrics.networkRequestsTotal.inc({ outcome: "success", transport: "http" });
    metrics.networkRequestsTotal.inc({ transport: "websocket", outcome: "failure" });

    expect(metrics.networkRequestsTotal.get({ transport: "http", outcome: "success" })).toBe(2);
    expect(metrics.networkRequestsTotal.get({ transport: "websocket", outcome: "failure" })).toBe(1);
    expect(metrics.networkRequestsTotal.get({ transport: "websocket", outcome: "success" })).toBe(0);
  });

  it("observes histogram buckets", () => {
    const metrics = createMetricsCollector();
    metrics.gatewayOperationDurationMs.observe(3, { interface: "cache" });
    metrics.gatewayOperationDurationMs.observe(30, { interface: "cache" });

    const snapshot = metrics.gatewayOperationDurationMs.get({ interface: "cache" });
    expect(snapshot?.count).toBe(2);
    expect(snapshot?.sum).toBe(33);
    expect(snapshot?.buckets.get(5)).toBe(1);
    expect(snapshot?.buckets.get(50)).toBe(2);
  });

  it("serializes to Prometheus text format", () => {
    const metrics = createMetricsCollector();
    metrics.circuitBreakerState.set(2, { name: "ha.local" });
    metrics.cacheEvictionsTotal.inc({ reason: "lru" }, 3);

    const text = metrics.serialize();

    expect(text.split("\n")).toContain('circuit_breaker_state{name="ha.local"} 2');
    expect(text.split("\n")).toContain('cache_evictions_total{reason="lru"} 3');
    expect(text.split("\n")).toContain("rate_limited_total 0");
    expect(text.endsWith("\n")).toBe(true);
  });

  it("records arbitrary named values", () => {
    const metrics = createMetricsCollector();
    metrics.record("intent.latency", 120, "ms");
    metrics.record("intent.latency", 80, "ms");
    metrics.record("alexa.requests", 1);

    expect(metrics.snapshot()).toEqual([
      { name: "alexa.requests", unit: "count", last: 1, count: 1, sum: 1 },
      { name: "intent.latency", unit: "ms", last: 80, count: 2, sum: 200 },
    ]);
    const lines = metrics.serialize().split("\n");
    expect(lines).toContain("# HELP intent_latency Recorded ms values");
    expect(lines).toContain("intent_latency 80");
  });

  it("reset clears every series and recorded value", () => {
    const metrics = createMetricsCollector();
    const counter = metrics.rateLimitedTotal;
    counter.inc({ transport: "http" });
    metrics.record("x", 1);

    metrics.reset();

    expect(metrics.rateLimitedTotal.get({ transport: "http" })).toBe(0);
    expect(metrics.snapshot()).toEqual([]);
  });
});
