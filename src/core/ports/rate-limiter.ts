/**
 * Port: sliding-window rate limiter: local admission control.
 * Protects this process from self-induced overload, not any remote server.
 */

export interface RateLimiterOptions {
  /** Ceiling of admitted operations inside one trailing window */
  readonly maxOperations: number;
  /** Trailing window length in ms (default: 1000) */
  readonly windowMs: number;
}

export interface RateLimiterStats {
  readonly maxOperations: number;
  readonly windowMs: number;
  /** Timestamps currently inside the window */
  readonly inWindow: number;
  readonly admitted: number;
  readonly rejected: number;
}

export interface RateLimiter {
  /** Admit (and record) or reject the current operation. Rejections are not recorded. */
  checkAndRecord(): boolean;
  stats(): RateLimiterStats;
  reset(): void;
}
