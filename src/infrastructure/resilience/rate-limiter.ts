/**
 * Sliding-window rate limiter: exact trailing-window admission control.
 *
 * Timestamps live in a fixed-capacity ring buffer sized to the ceiling, so
 * the window can never hold more than `maxOperations` entries. Eviction pops
 * from the head; admission pushes at the tail. Both are O(1) amortised.
 */

import { InvalidConfigError } from "../../core/errors/app-error.js";
import type { Clock } from "../../core/ports/clock.js";
import type {
  RateLimiter,
  RateLimiterOptions,
  RateLimiterStats,
} from "../../core/ports/rate-limiter.js";

export const createSlidingWindowRateLimiter = (
  options: RateLimiterOptions,
  clock: Pick<Clock, "now">,
): RateLimiter => {
  const { maxOperations, windowMs } = options;
  if (!Number.isInteger(maxOperations) || maxOperations < 1) {
    throw new InvalidConfigError("Rate limiter ceiling must be a positive integer", {
      maxOperations: [`received ${maxOperations}`],
    });
  }
  if (!(windowMs > 0)) {
    throw new InvalidConfigError("Rate limiter window must be positive", {
      windowMs: [`received ${windowMs}`],
    });
  }

  const ring = new Float64Array(maxOperations);
  let head = 0;
  let size = 0;
  let admitted = 0;
  let rejected = 0;

  const evictExpired = (now: number): void => {
    while (size > 0 && now - (ring[head] ?? now) >= windowMs) {
      head = (head + 1) % maxOperations;
      size--;
    }
  };

  return {
    checkAndRecord(): boolean {
      const now = clock.now();
      evictExpired(now);
      if (size >= maxOperations) {
        rejected++;
        return false;
      }
      ring[(head + size) % maxOperations] = now;
      size++;
      admitted++;
      return true;
    },

    stats(): RateLimiterStats {
      evictExpired(clock.now());
      return { maxOperations, windowMs, inWindow: size, admitted, rejected };
    },

    reset(): void {
      head = 0;
      size = 0;
      admitted = 0;
      rejected = 0;
    },
  };
};
