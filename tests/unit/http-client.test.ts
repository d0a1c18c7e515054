import { describe, expect, it } from "vitest";
import { ErrorKind, timedOut } from "../../src/core/errors/app-error.js";
import { CircuitState } from "../../src/core/ports/circuit-breaker.js";
import type { RetryPolicy } from "../../src/core/ports/retry.js";
import { createTtlCache } from "../../src/infrastructure/cache/ttl-cache.js";
import { createLogger } from "../../src/infrastructure/logging/logger.js";
import { createMetricsCollector } from "../../src/infrastructure/metrics/prometheus.js";
import { createHttpClient } from "../../src/infrastructure/network/http-client.js";
import { createCircuitBreakerRegistry } from "../../src/infrastructure/resilience/circuit-breaker-registry.js";
import { createSlidingWindowRateLimiter } from "../../src/infrastructure/resilience/rate-limiter.js";
import { DEFAULT_RETRY_POLICY } from "../../src/infrastructure/resilience/retry.js";
import {
  type ScriptedReply,
  captureStreams,
  createFakeClock,
  createFakeHttpTransport,
  refused,
} from "../helpers/fakes.js";

const URL_STATES = "http://ha.local:8123/api/states";

const singleAttempt: RetryPolicy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 1 };

const setup = (
  script: readonly ScriptedReply[],
  opts: { retryPolicy?: RetryPolicy; maxOperations?: number; withCache?: boolean } = {},
) => {
  const clock = createFakeClock();
  const transport = createFakeHttpTransport(script);
  const breakers = createCircuitBreakerRegistry(
    { failureThreshold: 3, recoveryTimeoutMs: 30_000, halfOpenMaxProbes: 1 },
    clock,
  );
  const metrics = createMetricsCollector();
  const cache = opts.withCache
    ? createTtlCache(
        {
          defaultTtlSeconds: 60,
          maxTtlSeconds: 3600,
          maxBytes: 10_000,
          maxEntries: 100,
          maxKeyLength: 250,
          pressure: { elevated: 0.75, high: 0.85, critical: 0.95, emergency: 0.98 },
        },
        { clock },
      )
    : undefined;
  const client = createHttpClient({
    transport,
    breakers: () => breakers,
    limiter: createSlidingWindowRateLimiter(
      { maxOperations: opts.maxOperations ?? 100, windowMs: 1000 },
      clock,
    ),
    clock,
    logger: () => createLogger("fatal", {}, "json", captureStreams()),
    metrics: () => metrics,
    retryPolicy: opts.retryPolicy ?? DEFAULT_RETRY_POLICY,
    requestTimeoutMs: 5_000,
    ...(cache ? { cache: () => cache } : {}),
  });
  return { client, clock, transport, breakers, metrics };
};

describe("HTTP client", () => {
  it("retries 503s with backoff and returns the eventual success", async () => {
    const { client, clock, transport, metrics } = setup([503, 503, 200]);

    const result = await client.get(URL_STATES);

    expect(result).toEqual({
      ok: true,
      value: {
        status: 200,
        headers: { "content-type": "application/json" },
        data: { status: 200 },
        attemptsUsed: 3,
        fromCache: false,
      },
    });
    expect(transport.requests).toHaveLength(3);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(client.getState().statistics).toEqual({
      requests: 1,
      successes: 1,
      failures: 0,
      retries: 2,
      rateLimited: 0,
      circuitRejected: 0,
      cacheHits: 0,
    });
    expect(metrics.networkRetriesTotal.get({ transport: "http" })).toBe(2);
    expect(metrics.networkRequestsTotal.get({ transport: "http", outcome: "success" })).toBe(1);
  });

  it("gives up with RetryExhaustedError after every attempt fails", async () => {
    const { client, transport } = setup([503]);

    const result = await client.get(URL_STATES);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe(ErrorKind.RETRY_EXHAUSTED);
    expect(result.error.details).toEqual({
      attempts: 3,
      lastErrorKind: "HttpStatusError",
      status: 503,
      url: URL_STATES,
    });
    expect(transport.requests).toHaveLength(3);
  });

  it("surfaces the attempt's own error with a single-attempt policy", async () => {
    const { client } = setup([timedOut(URL_STATES, 5_000)], { retryPolicy: singleAttempt });

    const result = await client.get(URL_STATES);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe(ErrorKind.TIMEOUT);
  });

  it("does not retry a non-retriable status", async () => {
    const { client, transport, clock } = setup([404]);

    const result = await client.get(URL_STATES);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe(ErrorKind.HTTP_STATUS);
      expect(result.error.details).toEqual({ status: 404, url: URL_STATES });
    }
    expect(transport.requests).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("retries connection failures", async () => {
    const { client, transport } = setup([refused(), 200]);
    const result = await client.get(URL_STATES);
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.attemptsUsed).toBe(2);
    expect(transport.requests).toHaveLength(2);
  });

  it("opens the circuit after three failures and stops sending", async () => {
    const { client, transport, breakers } = setup([500], { retryPolicy: singleAttempt });

    for (let i = 0; i < 3; i++) {
      await client.get(URL_STATES);
    }
    expect(breakers.get("ha.local:8123").state).toBe(CircuitState.OPEN);

    const rejected = await client.get(URL_STATES);

    expect(rejected.ok).toBe(false);
    if (!rejected.ok) expect(rejected.error.kind).toBe(ErrorKind.CIRCUIT_OPEN);
    expect(transport.requests).toHaveLength(3);
    expect(client.getState().statistics.circuitRejected).toBe(1);
  });

  it("lets exactly one probe through after the recovery timeout", async () => {
    const { client, transport, clock, breakers } = setup([500, 500, 500, 200], {
      retryPolicy: singleAttempt,
    });
    for (let i = 0; i < 3; i++) {
      await client.get(URL_STATES);
    }
    clock.advance(30_000);

    const [probe, concurrent] = await Promise.all([client.get(URL_STATES), client.get(URL_STATES)]);

    expect(probe.ok).toBe(true);
    expect(concurrent.ok).toBe(false);
    if (!concurrent.ok) expect(concurrent.error.kind).toBe(ErrorKind.CIRCUIT_OPEN);
    expect(transport.requests).toHaveLength(4);
    expect(breakers.get("ha.local:8123").state).toBe(CircuitState.CLOSED);
  });

  it("rejects past the local rate limit without sending", async () => {
    const { client, transport, metrics } = setup([200], { maxOperations: 1 });

    await client.get(URL_STATES);
    const limited = await client.get(URL_STATES);

    expect(limited.ok).toBe(false);
    if (!limited.ok) expect(limited.error.kind).toBe(ErrorKind.RATE_LIMITED);
    expect(transport.requests).toHaveLength(1);
    expect(metrics.rateLimitedTotal.get({ transport: "http" })).toBe(1);
  });

  it("sends JSON bodies, query parameters and the correlation header", async () => {
    const { client, transport } = setup([200]);

    await client.post(
      "http://ha.local:8123/api/services/light/turn_on",
      { entity_id: "light.kitchen" },
      { query: { verbose: true }, correlationId: "cid-1" },
    );

    expect(transport.requests[0]).toEqual({
      method: "POST",
      url: "http://ha.local:8123/api/services/light/turn_on?verbose=true",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
        "X-Correlation-Id": "cid-1",
      },
      body: '{"entity_id":"light.kitchen"}',
      timeoutMs: 5_000,
    });
  });

  it("rejects non-http URLs before admission", async () => {
    const { client, transport } = setup([200]);
    const result = await client.get("ftp://ha.local/file");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe(ErrorKind.VALIDATION);
    expect(transport.requests).toHaveLength(0);
    expect(client.getState().statistics.requests).toBe(0);
  });

  it("serves repeated GETs from the cache when asked", async () => {
    const { client, transport } = setup([200], { withCache: true });

    await client.get(URL_STATES, { cacheTtlSeconds: 30 });
    const cached = await client.get(URL_STATES, { cacheTtlSeconds: 30 });

    expect(cached).toEqual({
      ok: true,
      value: {
        status: 200,
        headers: { "content-type": "application/json" },
        data: { status: 200 },
        attemptsUsed: 0,
        fromCache: true,
      },
    });
    expect(transport.requests).toHaveLength(1);
    expect(client.getState().statistics.cacheHits).toBe(1);
  });

  it("returns raw text when the response is not JSON", async () => {
    const { client } = setup([{ status: 200, headers: { "content-type": "text/plain" }, body: "pong" }]);
    const result = await client.get(URL_STATES);
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.data).toBe("pong");
  });

  it("configureRetry replaces the policy for later calls", async () => {
    const { client, transport } = setup([503]);

    const updated = client.configureRetry({ maxAttempts: 2, retriableStatusCodes: [503, 500] });

    expect(updated).toEqual({
      ok: true,
      value: {
        maxAttempts: 2,
        backoffBaseMs: 100,
        backoffMultiplier: 2,
        retriableStatusCodes: [500, 503],
        budgetMs: 100,
      },
    });
    await client.get(URL_STATES);
    expect(transport.requests).toHaveLength(2);
    expect(client.configureRetry({ maxAttempts: 0 }).ok).toBe(false);
  });

  it("resetState zeroes statistics and closes this client's breakers", async () => {
    const { client, breakers } = setup([500], { retryPolicy: singleAttempt });
    for (let i = 0; i < 3; i++) {
      await client.get(URL_STATES);
    }

    client.resetState();

    expect(breakers.get("ha.local:8123").state).toBe(CircuitState.CLOSED);
    const state = client.getState();
    expect(state.statistics.requests).toBe(0);
    expect(state.rateLimiter.inWindow).toBe(0);
    expect(Object.keys(state.circuitBreakers)).toEqual(["ha.local:8123"]);
  });
});
