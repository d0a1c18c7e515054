import type { Clock } from "../../core/ports/clock.js";

/** Process clock: monotonic `performance.now()` plus timer-based sleep. */
export const createSystemClock = (): Clock => ({
  now: () => performance.now(),
  wallTime: () => new Date(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
});
