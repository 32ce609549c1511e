// packages/limiter/src/limiter.ts

import { secondsUntil, systemClock, windowStart, type Clock } from "@gatehouse/clock";

import { MemoryCounterStore, type CounterStore } from "./stores";

export type RateLimitTier = "standard" | "premium";

export interface RateLimiterConfig {
  /**
   * Rate limit window in milliseconds.
   * e.g. 60000 for 1 minute
   */
  windowMs: number;
  /**
   * Max number of requests per window for the standard tier.
   */
  limit: number;
  /**
   * Explicit premium threshold. Wins over premiumMultiplier when set.
   */
  premiumLimit?: number;
  /**
   * Premium threshold as a multiple of `limit`, never below 1. Defaults to 10.
   */
  premiumMultiplier?: number;
  /** Counter backend. Defaults to a process-local MemoryCounterStore. */
  store?: CounterStore;
  clock?: Clock;
}

export interface RateLimitDecision {
  allowed: boolean;
  /** Milliseconds until the current window closes. 0 when allowed. */
  retryAfterMs: number;
  limit: number;
  remaining: number;
  /** Epoch ms at which the current window ends. */
  resetAt: number;
}

export const DEFAULT_WINDOW_MS = 60_000;
export const DEFAULT_PREMIUM_MULTIPLIER = 10;

/**
 * Fixed-window limiter keyed by client identity.
 *
 * Each request increments the counter for (identity, windowStart) and is
 * judged on the count it produced, so two concurrent requests can never
 * both take the last slot. Adjacent windows can admit up to 2x the limit
 * around a boundary; that is inherent to fixed windows.
 */
export class FixedWindowRateLimiter {
  readonly windowMs: number;
  private readonly thresholds: Record<RateLimitTier, number>;
  private readonly store: CounterStore;
  private readonly clock: Clock;

  constructor(config: RateLimiterConfig) {
    if (!(config.windowMs > 0)) {
      throw new RangeError(`windowMs must be positive, got ${config.windowMs}`);
    }
    if (!(config.limit > 0)) {
      throw new RangeError(`limit must be positive, got ${config.limit}`);
    }

    this.windowMs = config.windowMs;
    const multiplier = config.premiumMultiplier ?? DEFAULT_PREMIUM_MULTIPLIER;
    this.thresholds = {
      standard: config.limit,
      premium: config.premiumLimit ?? Math.max(1, Math.floor(config.limit * multiplier)),
    };
    this.store = config.store ?? new MemoryCounterStore();
    this.clock = config.clock ?? systemClock;
  }

  threshold(tier: RateLimitTier): number {
    return this.thresholds[tier];
  }

  async admit(
    identity: string,
    tier: RateLimitTier,
    now: number = this.clock.now()
  ): Promise<RateLimitDecision> {
    const start = windowStart(now, this.windowMs);
    const resetAt = start + this.windowMs;
    const limit = this.threshold(tier);

    const count = await this.store.increment(`${identity}:${start}`, now, resetAt);

    if (count > limit) {
      return {
        allowed: false,
        retryAfterMs: resetAt - now,
        limit,
        remaining: 0,
        resetAt,
      };
    }

    return {
      allowed: true,
      retryAfterMs: 0,
      limit,
      remaining: limit - count,
      resetAt,
    };
  }

  reset(): Promise<void> {
    return this.store.reset();
  }
}

/**
 * IETF draft RateLimit-* headers (what express-rate-limit calls
 * `standardHeaders`) plus Retry-After on rejection.
 */
export function rateLimitHeaders(
  decision: RateLimitDecision,
  now: number
): Record<string, string> {
  const headers: Record<string, string> = {
    "RateLimit-Limit": String(decision.limit),
    "RateLimit-Remaining": String(decision.remaining),
    "RateLimit-Reset": String(secondsUntil(decision.resetAt, now)),
  };

  if (!decision.allowed) {
    headers["Retry-After"] = String(Math.max(1, secondsUntil(now + decision.retryAfterMs, now)));
  }

  return headers;
}
