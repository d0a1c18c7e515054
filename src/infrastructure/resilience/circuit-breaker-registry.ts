/**
 * Circuit breaker registry: one breaker per dependency name, created lazily
 * with shared default options and kept for the life of the process.
 */

import type {
  CircuitBreaker,
  CircuitBreakerOptions,
  CircuitBreakerSnapshot,
} from "../../core/ports/circuit-breaker.js";
import type { Clock } from "../../core/ports/clock.js";
import { createCircuitBreaker } from "./circuit-breaker.js";

export type CircuitBreakerDefaults = Omit<CircuitBreakerOptions, "name">;

export interface CircuitBreakerRegistry {
  /** Get the breaker for `name`, creating it with the defaults on first use */
  get(name: string): CircuitBreaker;
  has(name: string): boolean;
  all(): CircuitBreaker[];
  snapshots(): Record<string, CircuitBreakerSnapshot>;
  /** Reset one breaker to CLOSED; false when no breaker exists for `name` */
  reset(name: string): boolean;
  /** Reset every breaker; returns how many were reset */
  resetAll(): number;
}

export const createCircuitBreakerRegistry = (
  defaults: CircuitBreakerDefaults,
  clock: Pick<Clock, "now">,
): CircuitBreakerRegistry => {
  const breakers = new Map<string, CircuitBreaker>();

  return {
    get(name: string): CircuitBreaker {
      let breaker = breakers.get(name);
      if (!breaker) {
        breaker = createCircuitBreaker({ ...defaults, name }, clock);
        breakers.set(name, breaker);
      }
      return breaker;
    },

    has(name: string): boolean {
      return breakers.has(name);
    },

    all(): CircuitBreaker[] {
      return Array.from(breakers.values());
    },

    snapshots(): Record<string, CircuitBreakerSnapshot> {
      const result: Record<string, CircuitBreakerSnapshot> = {};
      for (const [name, breaker] of breakers) {
        result[name] = breaker.snapshot();
      }
      return result;
    },

    reset(name: string): boolean {
      const breaker = breakers.get(name);
      if (!breaker) return false;
      breaker.reset();
      return true;
    },

    resetAll(): number {
      for (const breaker of breakers.values()) {
        breaker.reset();
      }
      return breakers.size;
    },
  };
};
