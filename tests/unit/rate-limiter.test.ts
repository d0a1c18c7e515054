import { describe, expect, it } from "vitest";
import { InvalidConfigError } from "../../src/core/errors/app-error.js";
import { createSlidingWindowRateLimiter } from "../../src/infrastructure/resilience/rate-limiter.js";
import { createFakeClock } from "../helpers/fakes.js";

describe("Sliding-window rate limiter", () => {
  it("admits up to the ceiling inside one window", () => {
    const clock = createFakeClock();
    const limiter = createSlidingWindowRateLimiter({ maxOperations: 2, windowMs: 1000 }, clock);

    const decisions = [limiter.checkAndRecord(), limiter.checkAndRecord(), limiter.checkAndRecord()];

    expect(decisions).toEqual([true, true, false]);
    expect(limiter.stats()).toEqual({
      maxOperations: 2,
      windowMs: 1000,
      inWindow: 2,
      admitted: 2,
      rejected: 1,
    });
  });

  it("admits again once the oldest timestamp leaves the window", () => {
    const clock = createFakeClock();
    const limiter = createSlidingWindowRateLimiter({ maxOperations: 2, windowMs: 1000 }, clock);

    limiter.checkAndRecord(); // t=0
    clock.advance(400);
    limiter.checkAndRecord(); // t=400
    clock.advance(599);
    expect(limiter.checkAndRecord()).toBe(false); // t=999, both still inside

    clock.advance(1);
    expect(limiter.checkAndRecord()).toBe(true); // t=1000, t=0 has aged out
    expect(limiter.stats().inWindow).toBe(2);
  });

  it("does not record rejected attempts", () => {
    const clock = createFakeClock();
    const limiter = createSlidingWindowRateLimiter({ maxOperations: 1, windowMs: 1000 }, clock);

    limiter.checkAndRecord();
    clock.advance(500);
    limiter.checkAndRecord(); // rejected, must not extend the window
    clock.advance(500);

    expect(limiter.checkAndRecord()).toBe(true);
  });

  it("reset empties the window and counters", () => {
    const clock = createFakeClock();
    const limiter = createSlidingWindowRateLimiter({ maxOperations: 1, windowMs: 1000 }, clock);
    limiter.checkAndRecord();
    limiter.checkAndRecord();

    limiter.reset();

    expect(limiter.stats()).toEqual({
      maxOperations: 1,
      windowMs: 1000,
      inWindow: 0,
      admitted: 0,
      rejected: 0,
    });
    expect(limiter.checkAndRecord()).toBe(true);
  });

  it("rejects a non-positive ceiling or window", () => {
    const clock = createFakeClock();
    expect(() => createSlidingWindowRateLimiter({ maxOperations: 0, windowMs: 1000 }, clock)).toThrow(
      InvalidConfigError,
    );
    expect(() => createSlidingWindowRateLimiter({ maxOperations: 5, windowMs: 0 }, clock)).toThrow(
      InvalidConfigError,
    );
  });
});
