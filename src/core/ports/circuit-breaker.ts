/**
 * Circuit breaker port: failure isolation per downstream dependency.
 *
 * States:
 *   CLOSED    → normal operation; consecutive failures counted
 *   OPEN      → requests short-circuited until the recovery timeout elapses
 *   HALF_OPEN → a bounded number of probes test recovery
 *
 * The breaker is transport-agnostic: callers acquire a permit, perform the
 * work, then report the outcome with recordSuccess / recordFailure.
 */

import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export const CircuitState = {
  CLOSED: "CLOSED",
  OPEN: "OPEN",
  HALF_OPEN: "HALF_OPEN",
} as const;

export type CircuitState = (typeof CircuitState)[keyof typeof CircuitState];

export interface CircuitBreakerOptions {
  /** Dependency name for identification and metrics */
  readonly name: string;
  /** Consecutive failures before opening (1–20, default: 5) */
  readonly failureThreshold: number;
  /** Time in ms from opening until OPEN → HALF_OPEN (default: 45_000) */
  readonly recoveryTimeoutMs: number;
  /** Probes allowed in flight while HALF_OPEN (default: 1, max 2) */
  readonly halfOpenMaxProbes: number;
  /** Called on state change */
  readonly onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerSnapshot {
  readonly dependencyName: string;
  readonly status: CircuitState;
  readonly consecutiveFailures: number;
  readonly failureThreshold: number;
  readonly recoveryTimeoutMs: number;
  /** Monotonic ms of the last transition to OPEN, null while never opened or after closing */
  readonly openedAt: number | null;
  readonly halfOpenProbeInFlight: boolean;
  readonly statistics: {
    readonly totalCalls: number;
    readonly successfulCalls: number;
    readonly failedCalls: number;
    readonly rejectedCalls: number;
  };
}

export interface CircuitBreaker {
  /** Ask for admission; CircuitOpenError when OPEN or when probes are saturated */
  acquire(): Result<void, AppError>;
  recordSuccess(): void;
  recordFailure(): void;
  /** Current state (applies the lazy OPEN → HALF_OPEN transition) */
  readonly state: CircuitState;
  readonly name: string;
  readonly failureCount: number;
  snapshot(): CircuitBreakerSnapshot;
  /** Reset to CLOSED state */
  reset(): void;
}
