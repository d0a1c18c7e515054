/**
 * Port: Clock: time source for windows, TTLs and backoff.
 *
 * `now()` must be monotonic (milliseconds); `wallTime()` is only used for
 * human-facing timestamps. `sleep` is the only place the runtime waits.
 */
export interface Clock {
  now(): number;
  wallTime(): Date;
  sleep(ms: number): Promise<void>;
}
