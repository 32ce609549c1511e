// packages/breaker/src/registry.ts

import { silentLogger, type Logger } from "@gatehouse/audit";
import { systemClock, type Clock } from "@gatehouse/clock";

export type BreakerState = "closed" | "open" | "half_open";

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit. Defaults to 5. */
  failureThreshold: number;
  /** Time an open circuit waits before letting a trial through. Defaults to 60s. */
  recoveryTimeoutMs: number;
}

export const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeoutMs: 60_000,
};

/**
 * Ticket handed out for every admitted request. Releasing it records the
 * request's outcome; a permit can only be released once.
 */
export interface BreakerPermit {
  readonly service: string;
  readonly trial: boolean;
  /** Breaker generation the request was admitted under. */
  readonly generation: number;
  released: boolean;
}

export interface BreakerSnapshot {
  service: string;
  state: BreakerState;
  consecutiveFailures: number;
  openedAt: number | null;
  halfOpenTrialInFlight: boolean;
  totals: {
    successes: number;
    failures: number;
    rejected: number;
    staleOutcomes: number;
  };
}

interface ServiceBreaker {
  state: BreakerState;
  consecutiveFailures: number;
  openedAt: number;
  halfOpenTrialInFlight: boolean;
  generation: number;
  successes: number;
  failures: number;
  rejected: number;
  staleOutcomes: number;
}

export interface CircuitBreakerRegistryOptions {
  services?: Iterable<string>;
  config?: Partial<CircuitBreakerConfig>;
  clock?: Clock;
  logger?: Logger;
}

function freshBreaker(): ServiceBreaker {
  return {
    state: "closed",
    consecutiveFailures: 0,
    openedAt: 0,
    halfOpenTrialInFlight: false,
    generation: 0,
    successes: 0,
    failures: 0,
    rejected: 0,
    staleOutcomes: 0,
  };
}

/**
 * One circuit breaker per backend service.
 *
 *   closed    --failures >= threshold-->  open
 *   open      --recovery timeout, next request-->  half_open (that request is the trial)
 *   half_open --trial ok-->  closed
 *   half_open --trial failed-->  open (openedAt reset)
 *
 * All transitions happen synchronously inside a single call, so on the
 * event loop each service's state is mutated by one request at a time and
 * the half_open trial flag cannot be taken twice.
 *
 * Every transition bumps the breaker's generation. Outcomes of permits from
 * an older generation are counted but never drive a transition, so a slow
 * request admitted before the circuit opened cannot close it again.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, ServiceBreaker>();
  /** Admissions made through allowRequest, awaiting recordOutcome. */
  private readonly pendingPermits = new Map<string, BreakerPermit[]>();
  private readonly config: CircuitBreakerConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: CircuitBreakerRegistryOptions = {}) {
    this.config = { ...DEFAULT_BREAKER_CONFIG, ...options.config };
    if (!(this.config.failureThreshold >= 1)) {
      throw new RangeError(`failureThreshold must be >= 1, got ${this.config.failureThreshold}`);
    }
    if (!(this.config.recoveryTimeoutMs >= 0)) {
      throw new RangeError(`recoveryTimeoutMs must be >= 0, got ${this.config.recoveryTimeoutMs}`);
    }
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;

    for (const service of options.services ?? []) {
      this.breakers.set(service, freshBreaker());
    }
  }

  get services(): string[] {
    return [...this.breakers.keys()];
  }

  /**
   * Ask to send one request to `service`. Returns null when the caller
   * must fail fast without touching the backend.
   */
  acquire(service: string): BreakerPermit | null {
    const b = this.breakerFor(service);
    const now = this.clock.now();

    if (b.state === "open") {
      if (now - b.openedAt < this.config.recoveryTimeoutMs) {
        b.rejected++;
        return null;
      }
      this.transition(service, b, "half_open");
    }

    if (b.state === "half_open") {
      if (b.halfOpenTrialInFlight) {
        b.rejected++;
        return null;
      }
      b.halfOpenTrialInFlight = true;
      this.logger.info("half-open trial admitted", { service });
      return { service, trial: true, generation: b.generation, released: false };
    }

    return { service, trial: false, generation: b.generation, released: false };
  }

  /**
   * Record the outcome of the request admitted with `permit`.
   * Releasing a permit twice is a programming error and throws.
   */
  release(permit: BreakerPermit, success: boolean): void {
    if (permit.released) {
      throw new Error(`breaker permit for ${permit.service} released twice`);
    }
    permit.released = true;

    const b = this.breakerFor(permit.service);
    if (permit.generation !== b.generation) {
      this.recordStale(permit.service, b, success, permit.generation);
      return;
    }

    if (success) b.successes++;
    else b.failures++;

    if (permit.trial) {
      b.halfOpenTrialInFlight = false;
      if (success) {
        b.consecutiveFailures = 0;
        this.transition(permit.service, b, "closed");
      } else {
        b.consecutiveFailures++;
        this.open(permit.service, b);
      }
      return;
    }

    // Non-trial permit from the current generation; only a closed breaker issues these.
    if (success) {
      b.consecutiveFailures = 0;
      return;
    }

    b.consecutiveFailures++;
    if (b.consecutiveFailures >= this.config.failureThreshold) {
      this.open(permit.service, b);
    }
  }

  /**
   * Gate check in boolean form. An admitted call must be followed by exactly
   * one recordOutcome for the same service.
   */
  allowRequest(service: string): boolean {
    const permit = this.acquire(service);
    if (!permit) return false;
    this.pending(service).push(permit);
    return true;
  }

  /**
   * Counterpart of allowRequest. While a half_open trial is outstanding the
   * outcome settles the trial; otherwise the oldest outstanding admission.
   */
  recordOutcome(service: string, success: boolean): void {
    const b = this.breakerFor(service);
    const list = this.pending(service);
    const trialIdx = list.findIndex((p) => p.trial && p.generation === b.generation);
    const [permit] = list.splice(trialIdx >= 0 ? trialIdx : 0, 1);
    if (permit) {
      this.release(permit, success);
      return;
    }

    // Nothing on record and no trial out: the breaker admitted nothing to report on.
    if (b.state !== "closed" && !b.halfOpenTrialInFlight) {
      this.recordStale(service, b, success, b.generation);
      return;
    }
    this.release(
      { service, trial: b.halfOpenTrialInFlight, generation: b.generation, released: false },
      success
    );
  }

  state(service: string): BreakerState {
    const b = this.breakerFor(service);
    // Report the lazy open -> half_open transition without performing it.
    if (b.state === "open" && this.clock.now() - b.openedAt >= this.config.recoveryTimeoutMs) {
      return "half_open";
    }
    return b.state;
  }

  snapshot(): BreakerSnapshot[] {
    return [...this.breakers.entries()].map(([service, b]) => ({
      service,
      state: this.state(service),
      consecutiveFailures: b.consecutiveFailures,
      openedAt: b.state === "closed" ? null : b.openedAt,
      halfOpenTrialInFlight: b.halfOpenTrialInFlight,
      totals: {
        successes: b.successes,
        failures: b.failures,
        rejected: b.rejected,
        staleOutcomes: b.staleOutcomes,
      },
    }));
  }

  /**
   * Force one (or every) breaker back to closed. Outstanding permits become stale.
   */
  reset(service?: string): void {
    const targets = service === undefined ? this.services : [service];
    for (const name of targets) {
      const b = this.breakerFor(name);
      b.consecutiveFailures = 0;
      b.halfOpenTrialInFlight = false;
      this.transition(name, b, "closed");
      this.pendingPermits.delete(name);
    }
  }

  has(service: string): boolean {
    return this.breakers.has(service);
  }

  private pending(service: string): BreakerPermit[] {
    let list = this.pendingPermits.get(service);
    if (!list) {
      list = [];
      this.pendingPermits.set(service, list);
    }
    return list;
  }

  private breakerFor(service: string): ServiceBreaker {
    let b = this.breakers.get(service);
    if (!b) {
      b = freshBreaker();
      this.breakers.set(service, b);
    }
    return b;
  }

  private recordStale(
    service: string,
    b: ServiceBreaker,
    success: boolean,
    permitGeneration: number
  ): void {
    if (success) b.successes++;
    else b.failures++;
    b.staleOutcomes++;
    this.logger.debug("stale outcome ignored", {
      service,
      success,
      permitGeneration,
      generation: b.generation,
    });
  }

  private open(service: string, b: ServiceBreaker): void {
    b.openedAt = this.clock.now();
    this.transition(service, b, "open");
  }

  private transition(service: string, b: ServiceBreaker, to: BreakerState): void {
    const from = b.state;
    b.state = to;
    b.generation++;

    if (from === to) return;
    const meta = { service, from, to, consecutiveFailures: b.consecutiveFailures };
    if (to === "open") {
      this.logger.warn("circuit opened", meta);
    } else {
      this.logger.info("circuit state changed", meta);
    }
  }
}
