// packages/clock/src/index.ts

/**
 * Source of "now" in epoch-aligned milliseconds.
 * Everything time-windowed (rate limits, breakers, cache TTLs) reads time
 * through one of these so tests can drive it by hand.
 */
export interface Clock {
  now(): number;
}

/**
 * Monotonic wall-aligned clock: performance.now() never goes backwards,
 * and timeOrigin anchors it to the epoch so window math lines up with
 * Retry-After / reset timestamps.
 */
export const systemClock: Clock = {
  now: () => performance.timeOrigin + performance.now(),
};

/**
 * Hand-driven clock for tests and simulations.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function windowStart(now: number, windowMs: number): number {
  if (!(windowMs > 0)) {
    throw new RangeError(`windowMs must be positive, got ${windowMs}`);
  }
  return Math.floor(now / windowMs) * windowMs;
}

export function windowEnd(now: number, windowMs: number): number {
  return windowStart(now, windowMs) + windowMs;
}

/**
 * Whole seconds until `untilMs`, rounded up; never below zero.
 * Used for Retry-After style headers.
 */
export function secondsUntil(untilMs: number, now: number): number {
  return Math.max(0, Math.ceil((untilMs - now) / 1000));
}
