/**
 * Retry policy port: bounded, deterministic exponential backoff.
 *
 * delay(i) = backoffBaseMs × backoffMultiplier^i for the i-th retry (0-based),
 * so the total budget is known up front. No jitter.
 */

export interface RetryPolicy {
  /** Total attempts including the first (1–10, default: 3) */
  readonly maxAttempts: number;
  /** First backoff delay in ms (50–1000, default: 100) */
  readonly backoffBaseMs: number;
  /** Growth factor between delays (1.0–5.0, default: 2.0) */
  readonly backoffMultiplier: number;
  /** HTTP statuses treated as retriable (default: 408, 429, 500, 502, 503, 504) */
  readonly retriableStatusCodes: ReadonlySet<number>;
}

/** Outcome of a single attempt as classified by the transport-specific caller. */
export type AttemptOutcome<T, E> =
  | { readonly kind: "success"; readonly value: T }
  | { readonly kind: "retriable"; readonly error: E }
  | { readonly kind: "terminal"; readonly error: E };

export interface RetryRun<T, E> {
  readonly outcome: AttemptOutcome<T, E>;
  readonly attemptsUsed: number;
  /** Delays actually slept, in order */
  readonly delaysMs: readonly number[];
}

export interface RetryHooks {
  /** Called before sleeping ahead of the next attempt */
  readonly onRetry?: (attempt: number, delayMs: number) => void;
}
