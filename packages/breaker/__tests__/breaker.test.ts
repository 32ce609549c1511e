import { describe, it, expect, beforeEach } from "vitest";
import { ManualClock } from "@gatehouse/clock";

import { CircuitBreakerRegistry, type BreakerPermit } from "../src/index";

function admitted(registry: CircuitBreakerRegistry, service: string): BreakerPermit {
  const permit = registry.acquire(service);
  if (!permit) throw new Error(`breaker refused ${service}`);
  return permit;
}

function attempt(registry: CircuitBreakerRegistry, service: string, success: boolean): void {
  registry.release(admitted(registry, service), success);
}

describe("CircuitBreakerRegistry", () => {
  let clock: ManualClock;
  let registry: CircuitBreakerRegistry;

  beforeEach(() => {
    clock = new ManualClock(1_000_000);
    registry = new CircuitBreakerRegistry({
      services: ["order-service", "user-service"],
      config: { failureThreshold: 5, recoveryTimeoutMs: 60_000 },
      clock,
    });
  });

  it("creates a closed breaker per configured service", () => {
    expect(registry.services).toEqual(["order-service", "user-service"]);
    expect(registry.state("order-service")).toBe("closed");
    expect(registry.allowRequest("order-service")).toBe(true);
  });

  it("opens after the failure threshold and fails fast until recovery", () => {
    for (let i = 0; i < 5; i++) attempt(registry, "order-service", false);

    expect(registry.state("order-service")).toBe("open");
    expect(registry.acquire("order-service")).toBeNull();

    clock.advance(59_999);
    expect(registry.acquire("order-service")).toBeNull();

    clock.advance(1);
    const trial = registry.acquire("order-service");
    expect(trial?.trial).toBe(true);
    expect(registry.state("order-service")).toBe("half_open");
  });

  it("lets exactly one trial through while half-open", () => {
    for (let i = 0; i < 5; i++) attempt(registry, "order-service", false);
    clock.advance(60_000);

    const trial = admitted(registry, "order-service");
    expect(registry.acquire("order-service")).toBeNull();
    expect(registry.acquire("order-service")).toBeNull();

    registry.release(trial, true);
    expect(registry.state("order-service")).toBe("closed");
    expect(registry.acquire("order-service")?.trial).toBe(false);
  });

  it("closes and zeroes the failure count on a successful trial", () => {
    for (let i = 0; i < 5; i++) attempt(registry, "order-service", false);
    clock.advance(60_000);
    attempt(registry, "order-service", true);

    const [orders] = registry.snapshot();
    expect(orders.state).toBe("closed");
    expect(orders.consecutiveFailures).toBe(0);
    expect(orders.openedAt).toBeNull();
  });

  it("reopens on a failed trial and restarts the recovery timer", () => {
    for (let i = 0; i < 5; i++) attempt(registry, "order-service", false);
    clock.advance(60_000);
    attempt(registry, "order-service", false);

    expect(registry.state("order-service")).toBe("open");
    const [orders] = registry.snapshot();
    expect(orders.openedAt).toBe(1_060_000);

    clock.advance(30_000);
    expect(registry.acquire("order-service")).toBeNull();
    clock.advance(30_000);
    expect(registry.acquire("order-service")?.trial).toBe(true);
  });

  it("resets consecutive failures on any success while closed", () => {
    for (let i = 0; i < 4; i++) attempt(registry, "order-service", false);
    attempt(registry, "order-service", true);
    for (let i = 0; i < 4; i++) attempt(registry, "order-service", false);

    expect(registry.state("order-service")).toBe("closed");
    expect(registry.snapshot()[0].consecutiveFailures).toBe(4);
  });

  it("keeps services independent", () => {
    for (let i = 0; i < 5; i++) attempt(registry, "order-service", false);
    expect(registry.acquire("order-service")).toBeNull();
    expect(registry.acquire("user-service")).not.toBeNull();
  });

  it("counts concurrent failures without losing updates", async () => {
    const permits = Array.from({ length: 5 }, () => admitted(registry, "order-service"));
    await Promise.all(
      permits.map(async (p) => {
        await Promise.resolve();
        registry.release(p, false);
      })
    );
    expect(registry.state("order-service")).toBe("open");
    expect(registry.snapshot()[0].totals.failures).toBe(5);
  });

  it("ignores late outcomes from before the circuit opened", () => {
    const slow = admitted(registry, "order-service");
    for (let i = 0; i < 5; i++) attempt(registry, "order-service", false);

    registry.release(slow, true);
    expect(registry.state("order-service")).toBe("open");
    expect(registry.snapshot()[0].totals.staleOutcomes).toBe(1);
  });

  it("refuses to release a permit twice", () => {
    const permit = admitted(registry, "order-service");
    registry.release(permit, true);
    expect(() => registry.release(permit, true)).toThrow(/released twice/);
  });

  it("counts rejected requests", () => {
    for (let i = 0; i < 5; i++) attempt(registry, "order-service", false);
    registry.acquire("order-service");
    registry.acquire("order-service");
    expect(registry.snapshot()[0].totals.rejected).toBe(2);
  });

  it("reset forces a breaker closed", () => {
    for (let i = 0; i < 5; i++) attempt(registry, "order-service", false);
    registry.reset("order-service");
    expect(registry.state("order-service")).toBe("closed");
    expect(registry.acquire("order-service")).not.toBeNull();
  });

  it("creates breakers lazily for unknown services", () => {
    expect(registry.has("billing")).toBe(false);
    expect(registry.allowRequest("billing")).toBe(true);
    expect(registry.has("billing")).toBe(true);
  });

  it("reports the same state in snapshots once recovery is due", () => {
    for (let i = 0; i < 5; i++) attempt(registry, "order-service", false);
    clock.advance(60_000);

    expect(registry.state("order-service")).toBe("half_open");
    const [orders] = registry.snapshot();
    expect(orders.state).toBe("half_open");
    expect(orders.openedAt).toBe(1_000_000);
  });

  it("rejects invalid configuration", () => {
    expect(() => new CircuitBreakerRegistry({ config: { failureThreshold: 0 } })).toThrow(RangeError);
  });
});

describe("allowRequest / recordOutcome", () => {
  it("walks the full lifecycle through the boolean contract", () => {
    const clock = new ManualClock(0);
    const registry = new CircuitBreakerRegistry({ clock });

    for (let i = 0; i < 5; i++) {
      expect(registry.allowRequest("orders")).toBe(true);
      registry.recordOutcome("orders", false);
    }
    expect(registry.allowRequest("orders")).toBe(false);

    clock.advance(60_000);
    expect(registry.allowRequest("orders")).toBe(true);
    expect(registry.allowRequest("orders")).toBe(false);

    registry.recordOutcome("orders", true);
    expect(registry.state("orders")).toBe("closed");
    expect(registry.snapshot()[0].consecutiveFailures).toBe(0);
  });

  it("does not re-open an open circuit on an unmatched failure", () => {
    const clock = new ManualClock(0);
    const registry = new CircuitBreakerRegistry({ clock, config: { failureThreshold: 1 } });

    expect(registry.allowRequest("orders")).toBe(true);
    registry.recordOutcome("orders", false);
    expect(registry.state("orders")).toBe("open");

    clock.advance(30_000);
    registry.recordOutcome("orders", false);
    expect(registry.snapshot()[0].openedAt).toBe(0);
    expect(registry.snapshot()[0].totals).toEqual({
      successes: 0,
      failures: 2,
      rejected: 0,
      staleOutcomes: 1,
    });

    clock.advance(30_000);
    expect(registry.state("orders")).toBe("half_open");
  });

  it("settles the trial first when older admissions are still outstanding", () => {
    const clock = new ManualClock(0);
    const registry = new CircuitBreakerRegistry({ clock, config: { failureThreshold: 1 } });

    expect(registry.allowRequest("orders")).toBe(true); // slow request, still pending
    expect(registry.allowRequest("orders")).toBe(true);
    registry.recordOutcome("orders", false); // settles the oldest: opens the circuit
    expect(registry.state("orders")).toBe("open");

    clock.advance(60_000);
    expect(registry.allowRequest("orders")).toBe(true); // trial
    registry.recordOutcome("orders", true);
    expect(registry.state("orders")).toBe("closed");
  });
});
