// packages/gateway-core/src/factory.ts

import { createLogger, type Logger } from "@gatehouse/audit";
import { CircuitBreakerRegistry } from "@gatehouse/breaker";
import { MemoryCacheStore, ResponseCache, type CacheStore } from "@gatehouse/cache";
import { systemClock, type Clock } from "@gatehouse/clock";
import {
  createIdentityVerifier,
  MemoryRevocationStore,
  type RevocationStore,
  type TokenVerifier,
} from "@gatehouse/identity-core";
import { FixedWindowRateLimiter, MemoryCounterStore, type CounterStore } from "@gatehouse/limiter";

import type { GatewayConfig } from "./config";
import type { FetchLike } from "./forwarder";
import { InstanceHealthMonitor } from "./health-monitor";
import { GatewayPipeline } from "./pipeline";

export interface GatewayComponentOverrides {
  counterStore?: CounterStore;
  cacheStore?: CacheStore;
  revocations?: RevocationStore;
  /** Replaces the JWKS-backed verifier entirely. */
  verifier?: TokenVerifier;
  fetch?: FetchLike;
  clock?: Clock;
  logger?: Logger;
}

export interface GatewayComponents {
  pipeline: GatewayPipeline;
  verifier: TokenVerifier;
  revocations: RevocationStore;
  health?: InstanceHealthMonitor;
}

/**
 * Wire a pipeline from config. Stores default to process-local memory.
 */
export function createGatewayPipeline(
  config: GatewayConfig,
  overrides: GatewayComponentOverrides = {}
): GatewayComponents {
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? createLogger("gateway", { level: config.logLevel });
  const revocations = overrides.revocations ?? new MemoryRevocationStore({ clock });

  const verifier =
    overrides.verifier ??
    createIdentityVerifier({
      issuer: config.identity.issuer,
      audience: config.identity.audience,
      jwksUri: config.identity.jwksUri,
      timeoutMs: config.identity.timeoutMs,
      revocations,
      logger: logger.child("identity"),
    });

  const health =
    config.healthCheckIntervalMs > 0
      ? new InstanceHealthMonitor({
          services: config.services,
          intervalMs: config.healthCheckIntervalMs,
          fetch: overrides.fetch,
          logger: logger.child("health"),
        })
      : undefined;

  const pipeline = new GatewayPipeline({
    config,
    verifier,
    limiter: new FixedWindowRateLimiter({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.limit,
      premiumLimit: config.rateLimit.premiumLimit,
      premiumMultiplier: config.rateLimit.premiumMultiplier,
      store: overrides.counterStore ?? new MemoryCounterStore(),
      clock,
    }),
    breakers: new CircuitBreakerRegistry({
      services: config.services.map((s) => s.name),
      config: config.breaker,
      clock,
      logger: logger.child("breaker"),
    }),
    cache: new ResponseCache({
      store: overrides.cacheStore ?? new MemoryCacheStore({ maxEntries: config.cache.maxEntries }),
      defaultTtlMs: config.cache.ttlMs,
      clock,
      logger: logger.child("cache"),
    }),
    health,
    fetch: overrides.fetch,
    clock,
    logger: logger.child("pipeline"),
  });

  return { pipeline, verifier, revocations, health };
}
