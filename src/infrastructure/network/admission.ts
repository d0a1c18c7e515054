/**
 * Admission and outcome helpers shared by the HTTP and WebSocket clients.
 *
 * Admission runs once per call, before the first attempt: rate limiter first,
 * then the dependency's circuit breaker. Neither rejection is retried.
 */

import {
  type AppError,
  ErrorKind,
  isRetriable,
  rateLimited,
  retryExhausted,
} from "../../core/errors/app-error.js";
import type { CircuitBreaker } from "../../core/ports/circuit-breaker.js";
import type { MetricsCollector } from "../../core/ports/metrics.js";
import type { RateLimiter } from "../../core/ports/rate-limiter.js";
import type { AttemptOutcome, RetryPolicy, RetryRun } from "../../core/ports/retry.js";
import { type Result, err, ok } from "../../core/types/result.js";

export type Transport = "http" | "websocket";

export interface ClientCounters {
  requests: number;
  successes: number;
  failures: number;
  retries: number;
  rateLimited: number;
  circuitRejected: number;
}

export const emptyCounters = (): ClientCounters => ({
  requests: 0,
  successes: 0,
  failures: 0,
  retries: 0,
  rateLimited: 0,
  circuitRejected: 0,
});

interface AdmissionContext {
  readonly transport: Transport;
  readonly limiter: RateLimiter;
  readonly breaker: CircuitBreaker;
  readonly metrics: MetricsCollector;
  readonly counters: ClientCounters;
}

export const admit = (ctx: AdmissionContext): Result<void, AppError> => {
  const { transport, limiter, breaker, metrics, counters } = ctx;

  if (!limiter.checkAndRecord()) {
    counters.rateLimited++;
    metrics.rateLimitedTotal.inc({ transport });
    return err(rateLimited(`${transport} client`));
  }

  const permit = breaker.acquire();
  if (!permit.ok) {
    counters.circuitRejected++;
    metrics.networkRequestsTotal.inc({ transport, outcome: "circuit_open" });
    return permit;
  }

  return ok(undefined);
};

/** Report a failed attempt to the breaker and classify it for the retry loop. */
export const failedAttempt = (
  breaker: CircuitBreaker,
  error: AppError,
): AttemptOutcome<never, AppError> => {
  breaker.recordFailure();
  return isRetriable(error.kind) ? { kind: "retriable", error } : { kind: "terminal", error };
};

/**
 * Report a failure that happened after the payload left this process. The
 * peer may already have acted on it, so the attempt is never repeated.
 */
export const deliveredAttempt = (
  breaker: CircuitBreaker,
  error: AppError,
): AttemptOutcome<never, AppError> => {
  breaker.recordFailure();
  return { kind: "terminal", error };
};

/**
 * Collapse a finished retry run into a Result. A retriable failure that used
 * up several attempts becomes RetryExhaustedError; with a single-attempt
 * policy the attempt's own error surfaces.
 */
export const settleRun = <T>(
  policy: RetryPolicy,
  run: RetryRun<T, AppError>,
): Result<T, AppError> => {
  const { outcome, attemptsUsed } = run;
  switch (outcome.kind) {
    case "success":
      return ok(outcome.value);
    case "terminal":
      return err(outcome.error);
    case "retriable":
      return policy.maxAttempts > 1
        ? err(retryExhausted(attemptsUsed, outcome.error))
        : err(outcome.error);
  }
};

export const outcomeLabel = (result: Result<unknown, AppError>): string =>
  result.ok ? "success" : result.error.kind === ErrorKind.RETRY_EXHAUSTED ? "exhausted" : "failure";
