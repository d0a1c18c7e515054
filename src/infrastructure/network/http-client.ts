/**
 * Retrying HTTP client: rate-limited, breaker-guarded request/response calls.
 *
 * Per call:
 *   1. optional read-through cache (GET only): bypasses every guard below
 *   2. rate limiter → RateLimitError
 *   3. circuit breaker for the URL host → CircuitOpenError, no I/O
 *   4. attempts with per-attempt timeout and geometric backoff
 *
 * Limiter and breaker are consulted once per call, never mid-retry.
 */

import { type AppError, httpStatusError, validation } from "../../core/errors/app-error.js";
import type { Cache } from "../../core/ports/cache.js";
import type { CircuitBreakerSnapshot } from "../../core/ports/circuit-breaker.js";
import type { Clock } from "../../core/ports/clock.js";
import type { HttpMethod, HttpTransport, TransportResponse } from "../../core/ports/http-transport.js";
import type { Logger } from "../../core/ports/logger.js";
import type { MetricsCollector } from "../../core/ports/metrics.js";
import type { RateLimiter, RateLimiterStats } from "../../core/ports/rate-limiter.js";
import type { AttemptOutcome, RetryPolicy } from "../../core/ports/retry.js";
import { type Result, err, ok, tryCatch } from "../../core/types/result.js";
import type { CircuitBreakerRegistry } from "../resilience/circuit-breaker-registry.js";
import {
  DEFAULT_RETRY_POLICY,
  describeRetryPolicy,
  executeWithRetry,
  isRetriableStatus,
  parseRetryPolicy,
} from "../resilience/retry.js";
import {
  type ClientCounters,
  admit,
  emptyCounters,
  failedAttempt,
  outcomeLabel,
  settleRun,
} from "./admission.js";

export interface HttpRequestOptions {
  readonly headers?: Readonly<Record<string, string>>;
  readonly query?: Readonly<Record<string, string | number | boolean>>;
  /** Serialised as the JSON request body */
  readonly json?: unknown;
  /** Per-attempt timeout; defaults to the client's */
  readonly timeoutMs?: number;
  /** GET only: serve from and populate the cache for this many seconds */
  readonly cacheTtlSeconds?: number;
  readonly correlationId?: string;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  /** Parsed JSON when the response says so, raw text otherwise */
  readonly data: unknown;
  readonly attemptsUsed: number;
  readonly fromCache: boolean;
}

export type RetryPolicyDescription = ReturnType<typeof describeRetryPolicy>;

export interface HttpClientState {
  readonly retryPolicy: RetryPolicyDescription;
  readonly rateLimiter: RateLimiterStats;
  readonly circuitBreakers: Record<string, CircuitBreakerSnapshot>;
  readonly statistics: Readonly<ClientCounters> & { readonly cacheHits: number };
}

export interface HttpClient {
  request(
    method: HttpMethod,
    url: string,
    options?: HttpRequestOptions,
  ): Promise<Result<HttpResponse, AppError>>;
  get(url: string, options?: HttpRequestOptions): Promise<Result<HttpResponse, AppError>>;
  post(url: string, json?: unknown, options?: HttpRequestOptions): Promise<Result<HttpResponse, AppError>>;
  put(url: string, json?: unknown, options?: HttpRequestOptions): Promise<Result<HttpResponse, AppError>>;
  delete(url: string, options?: HttpRequestOptions): Promise<Result<HttpResponse, AppError>>;
  /** Replace the retry policy wholesale; fields left out keep their current values */
  configureRetry(input: unknown): Result<RetryPolicyDescription, AppError>;
  getState(): HttpClientState;
  /** Zero the statistics, empty the limiter window and close this client's breakers */
  resetState(): void;
}

/**
 * Shared components are passed as resolvers and looked up on every call, so a
 * component rebuilt in the registry is the one this client talks to.
 */
interface HttpClientDeps {
  readonly transport: HttpTransport;
  readonly breakers: () => CircuitBreakerRegistry;
  readonly limiter: RateLimiter;
  readonly clock: Clock;
  readonly logger: () => Logger;
  readonly metrics: () => MetricsCollector;
  readonly cache?: () => Cache;
  readonly retryPolicy?: RetryPolicy;
  readonly requestTimeoutMs: number;
  /** Relative URLs are resolved against this */
  readonly baseUrl?: string;
}

interface CachedResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly data: unknown;
}

const TRANSPORT = "http";

const resolveUrl = (
  url: string,
  baseUrl: string | undefined,
  query: HttpRequestOptions["query"],
): Result<URL, AppError> => {
  const parsed = tryCatch(() => new URL(url, baseUrl));
  if (!parsed.ok) {
    return err(validation("Invalid request URL", { url }));
  }
  const target = parsed.value;
  if (target.protocol !== "http:" && target.protocol !== "https:") {
    return err(validation("Request URL must use http or https", { url }));
  }
  for (const [key, value] of Object.entries(query ?? {})) {
    target.searchParams.set(key, String(value));
  }
  return ok(target);
};

const parseBody = (response: TransportResponse): unknown => {
  const contentType = response.headers["content-type"] ?? "";
  if (!contentType.includes("json") || response.body.length === 0) {
    return response.body;
  }
  const parsed = tryCatch((): unknown => JSON.parse(response.body));
  return parsed.ok ? parsed.value : response.body;
};

const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

export const createHttpClient = (deps: HttpClientDeps): HttpClient => {
  const { transport, breakers, limiter, clock, logger, metrics, cache, requestTimeoutMs, baseUrl } =
    deps;

  let policy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
  let counters = emptyCounters();
  let cacheHits = 0;
  const dependencies = new Set<string>();

  const request = async (
    method: HttpMethod,
    url: string,
    options: HttpRequestOptions = {},
  ): Promise<Result<HttpResponse, AppError>> => {
    const resolved = resolveUrl(url, baseUrl, options.query);
    if (!resolved.ok) return resolved;
    const target = resolved.value;
    const href = target.toString();
    const metricsSink = metrics();
    const log = logger().child({
      transport: TRANSPORT,
      method,
      url: href,
      ...(options.correlationId !== undefined ? { correlationId: options.correlationId } : {}),
    });

    const headers: Record<string, string> = { Accept: "application/json", ...options.headers };
    let body: string | undefined;
    if (options.json !== undefined) {
      const encoded = tryCatch(() => JSON.stringify(options.json));
      if (!encoded.ok) {
        return err(validation("Request body must be JSON-serialisable"));
      }
      body = encoded.value;
      headers["Content-Type"] = "application/json";
    }
    if (options.correlationId !== undefined) {
      headers["X-Correlation-Id"] = options.correlationId;
    }

    const store = method === "GET" && options.cacheTtlSeconds !== undefined ? cache?.() : undefined;
    const cacheKey = `http:GET:${href}`;
    if (store) {
      const cached = store.get<CachedResponse>(cacheKey);
      if (cached.hit) {
        cacheHits++;
        log.debug("Served from cache");
        return ok({ ...cached.value, attemptsUsed: 0, fromCache: true });
      }
    }

    counters.requests++;
    const breaker = breakers().get(target.host);
    dependencies.add(target.host);

    const admitted = admit({ transport: TRANSPORT, limiter, breaker, metrics: metricsSink, counters });
    if (!admitted.ok) {
      log.warn("Request rejected before sending", { errorKind: admitted.error.kind });
      return admitted;
    }

    const timeoutMs = options.timeoutMs ?? requestTimeoutMs;
    const activePolicy = policy;

    const attempt = async (attemptNumber: number): Promise<AttemptOutcome<TransportResponse, AppError>> => {
      const sent = await transport.send({ method, url: href, headers, body, timeoutMs });
      if (!sent.ok) {
        log.debug("Attempt failed", { attempt: attemptNumber, errorKind: sent.error.kind });
        return failedAttempt(breaker, sent.error);
      }
      const { status } = sent.value;
      if (isSuccessStatus(status)) {
        breaker.recordSuccess();
        return { kind: "success", value: sent.value };
      }
      log.debug("Attempt returned error status", { attempt: attemptNumber, status });
      breaker.recordFailure();
      const error = httpStatusError(status, href);
      return isRetriableStatus(activePolicy, status)
        ? { kind: "retriable", error }
        : { kind: "terminal", error };
    };

    const run = await executeWithRetry(activePolicy, attempt, {
      sleep: clock.sleep,
      onRetry: (attemptNumber, delayMs) => {
        counters.retries++;
        metricsSink.networkRetriesTotal.inc({ transport: TRANSPORT });
        log.info("Retrying request", { attempt: attemptNumber, delayMs });
      },
    });

    const settled = settleRun(activePolicy, run);
    metricsSink.networkRequestsTotal.inc({ transport: TRANSPORT, outcome: outcomeLabel(settled) });

    if (!settled.ok) {
      counters.failures++;
      log.warn("Request failed", {
        errorKind: settled.error.kind,
        attemptsUsed: run.attemptsUsed,
      });
      return settled;
    }

    counters.successes++;
    const response: CachedResponse = {
      status: settled.value.status,
      headers: settled.value.headers,
      data: parseBody(settled.value),
    };

    if (store && options.cacheTtlSeconds !== undefined) {
      const stored = store.set(cacheKey, response, options.cacheTtlSeconds);
      if (!stored.ok) {
        log.warn("Response not cached", { reason: stored.error.message });
      }
    }

    return ok({ ...response, attemptsUsed: run.attemptsUsed, fromCache: false });
  };

  return {
    request,

    get: (url, options) => request("GET", url, options),
    post: (url, json, options) => request("POST", url, { ...options, json }),
    put: (url, json, options) => request("PUT", url, { ...options, json }),
    delete: (url, options) => request("DELETE", url, options),

    configureRetry(input: unknown): Result<RetryPolicyDescription, AppError> {
      const parsed = parseRetryPolicy(input, policy);
      if (!parsed.ok) return parsed;
      policy = parsed.value;
      logger().info("Retry policy updated", { transport: TRANSPORT, ...describeRetryPolicy(policy) });
      return ok(describeRetryPolicy(policy));
    },

    getState(): HttpClientState {
      const registry = breakers();
      const circuitBreakers: Record<string, CircuitBreakerSnapshot> = {};
      for (const name of dependencies) {
        circuitBreakers[name] = registry.get(name).snapshot();
      }
      return {
        retryPolicy: describeRetryPolicy(policy),
        rateLimiter: limiter.stats(),
        circuitBreakers,
        statistics: { ...counters, cacheHits },
      };
    },

    resetState(): void {
      counters = emptyCounters();
      cacheHits = 0;
      limiter.reset();
      const registry = breakers();
      for (const name of dependencies) {
        registry.reset(name);
      }
    },
  };
};
