import { describe, it, expect } from "vitest";

import {
  ManualClock,
  secondsUntil,
  systemClock,
  windowEnd,
  windowStart,
} from "../src/index";

describe("windowStart / windowEnd", () => {
  it("buckets a timestamp into its fixed window", () => {
    expect(windowStart(125_000, 60_000)).toBe(120_000);
    expect(windowEnd(125_000, 60_000)).toBe(180_000);
  });

  it("treats the exact boundary as the start of the next window", () => {
    expect(windowStart(180_000, 60_000)).toBe(180_000);
  });

  it("rejects non-positive windows", () => {
    expect(() => windowStart(1, 0)).toThrow(RangeError);
  });
});

describe("secondsUntil", () => {
  it("rounds partial seconds up", () => {
    expect(secondsUntil(180_000, 125_500)).toBe(55);
  });

  it("never goes negative", () => {
    expect(secondsUntil(1_000, 5_000)).toBe(0);
  });
});

describe("clocks", () => {
  it("ManualClock moves only when told to", () => {
    const clock = new ManualClock(1_000);
    expect(clock.now()).toBe(1_000);
    clock.advance(500);
    expect(clock.now()).toBe(1_500);
    clock.set(10);
    expect(clock.now()).toBe(10);
  });

  it("systemClock does not go backwards", () => {
    const a = systemClock.now();
    const b = systemClock.now();
    expect(b).toBeGreaterThanOrEqual(a);
  });
});
