/**
 * Circuit breaker implementation: failure isolation per downstream dependency.
 *
 * State machine:
 *   CLOSED    → (consecutive failures ≥ threshold)      → OPEN
 *   OPEN      → (recoveryTimeoutMs since openedAt)      → HALF_OPEN
 *   HALF_OPEN → (probe success)                         → CLOSED
 *   HALF_OPEN → (probe failure)                         → OPEN
 *
 * The OPEN → HALF_OPEN transition is applied lazily whenever state is read.
 * Callers acquire a permit, do the work, then report the outcome.
 */

import { type AppError, InvalidConfigError, circuitOpen } from "../../core/errors/app-error.js";
import {
  type CircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitBreakerSnapshot,
  CircuitState,
} from "../../core/ports/circuit-breaker.js";
import type { Clock } from "../../core/ports/clock.js";
import { type Result, err, ok } from "../../core/types/result.js";

const validateOptions = (options: CircuitBreakerOptions): void => {
  const issues: Record<string, string[]> = {};
  const { failureThreshold, recoveryTimeoutMs, halfOpenMaxProbes } = options;
  if (!Number.isInteger(failureThreshold) || failureThreshold < 1 || failureThreshold > 20) {
    issues["failureThreshold"] = [`must be an integer in 1–20, received ${failureThreshold}`];
  }
  if (!(recoveryTimeoutMs > 0)) {
    issues["recoveryTimeoutMs"] = [`must be positive, received ${recoveryTimeoutMs}`];
  }
  if (!Number.isInteger(halfOpenMaxProbes) || halfOpenMaxProbes < 1 || halfOpenMaxProbes > 2) {
    issues["halfOpenMaxProbes"] = [`must be 1 or 2, received ${halfOpenMaxProbes}`];
  }
  if (options.name.length === 0) {
    issues["name"] = ["must not be empty"];
  }
  if (Object.keys(issues).length > 0) {
    throw new InvalidConfigError(`Invalid circuit breaker options for "${options.name}"`, issues);
  }
};

export const createCircuitBreaker = (
  options: CircuitBreakerOptions,
  clock: Pick<Clock, "now">,
): CircuitBreaker => {
  validateOptions(options);
  const { name, failureThreshold, recoveryTimeoutMs, halfOpenMaxProbes, onStateChange } = options;

  let state: CircuitState = CircuitState.CLOSED;
  let failures = 0;
  let openedAt: number | null = null;
  let probesInFlight = 0;

  let totalCalls = 0;
  let successfulCalls = 0;
  let failedCalls = 0;
  let rejectedCalls = 0;

  const transition = (to: CircuitState): void => {
    if (state === to) return;
    const from = state;
    state = to;
    onStateChange?.(name, from, to);
  };

  const open = (): void => {
    openedAt = clock.now();
    probesInFlight = 0;
    transition(CircuitState.OPEN);
  };

  const currentState = (): CircuitState => {
    if (state === CircuitState.OPEN && openedAt !== null) {
      if (clock.now() - openedAt >= recoveryTimeoutMs) {
        probesInFlight = 0;
        transition(CircuitState.HALF_OPEN);
      }
    }
    return state;
  };

  return {
    acquire(): Result<void, AppError> {
      totalCalls++;
      const current = currentState();

      if (current === CircuitState.OPEN) {
        rejectedCalls++;
        return err(circuitOpen(name));
      }

      // In HALF_OPEN, limit concurrent probes
      if (current === CircuitState.HALF_OPEN) {
        if (probesInFlight >= halfOpenMaxProbes) {
          rejectedCalls++;
          return err(circuitOpen(name));
        }
        probesInFlight++;
      }

      return ok(undefined);
    },

    recordSuccess(): void {
      successfulCalls++;
      failures = 0;
      if (currentState() === CircuitState.HALF_OPEN) {
        probesInFlight = 0;
        openedAt = null;
        transition(CircuitState.CLOSED);
      }
    },

    recordFailure(): void {
      failedCalls++;
      failures++;
      const current = currentState();

      if (current === CircuitState.HALF_OPEN) {
        open();
      } else if (current === CircuitState.CLOSED && failures >= failureThreshold) {
        open();
      }
    },

    get state() {
      return currentState();
    },

    get name() {
      return name;
    },

    get failureCount() {
      return failures;
    },

    snapshot(): CircuitBreakerSnapshot {
      const status = currentState();
      return {
        dependencyName: name,
        status,
        consecutiveFailures: failures,
        failureThreshold,
        recoveryTimeoutMs,
        openedAt,
        halfOpenProbeInFlight: probesInFlight > 0,
        statistics: { totalCalls, successfulCalls, failedCalls, rejectedCalls },
      };
    },

    reset(): void {
      failures = 0;
      openedAt = null;
      probesInFlight = 0;
      totalCalls = 0;
      successfulCalls = 0;
      failedCalls = 0;
      rejectedCalls = 0;
      transition(CircuitState.CLOSED);
    },
  };
};
