// packages/request-context/src/index.ts

export * from "./types";

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

import type {
  GatewayContext,
  GatewayRequestMeta,
} from "./types";

export type GatewayContextOverrides = Omit<Partial<GatewayContext>, "request"> & {
  request?: Partial<GatewayRequestMeta>;
};

export function createGatewayContext(
  overrides: GatewayContextOverrides = {}
): GatewayContext {
  const reqOverrides: Partial<GatewayRequestMeta> = overrides.request ?? {};

  const request: GatewayRequestMeta = {
    requestId: reqOverrides.requestId ?? `gw_${randomUUID()}`,
    startedAt: reqOverrides.startedAt ?? new Date().toISOString(),
    method: reqOverrides.method ?? "UNKNOWN",
    path: reqOverrides.path ?? "UNKNOWN",
    ip: reqOverrides.ip,
    origin: reqOverrides.origin,
    userAgent: reqOverrides.userAgent,
  };

  return {
    request,
    identity: overrides.identity,
    limits: overrides.limits,
    routing: overrides.routing,
    cache: overrides.cache,
    breaker: overrides.breaker,
    extras: overrides.extras ?? {},
  };
}

export function mergeGatewayContext(
  base: GatewayContext,
  updates: Partial<GatewayContext>
): GatewayContext {
  return {
    ...base,
    ...updates,
    request: { ...base.request, ...updates.request },
    identity: updates.identity ?? base.identity,
    limits: { ...base.limits, ...updates.limits },
    routing: { ...base.routing, ...updates.routing },
    cache: { ...base.cache, ...updates.cache },
    breaker: { ...base.breaker, ...updates.breaker },
    extras: { ...base.extras, ...updates.extras },
  };
}

const gatewayAls = new AsyncLocalStorage<GatewayContext>();

/**
 * Run a function with a fresh GatewayContext bound to the current async call chain.
 * Called once per inbound HTTP request, before any other gateway middleware.
 */
export function runWithGatewayContext<T>(
  overrides: GatewayContextOverrides,
  fn: () => T
): T {
  const ctx = createGatewayContext(overrides);
  return gatewayAls.run(ctx, fn);
}

/**
 * Run a function with an existing context bound, e.g. one created before
 * body parsing (stream callbacks do not always carry async context).
 */
export function bindGatewayContext<T>(ctx: GatewayContext, fn: () => T): T {
  return gatewayAls.run(ctx, fn);
}

/**
 * Get the current GatewayContext (if any) for this async call chain.
 * Returns undefined if called outside runWithGatewayContext.
 */
export function getGatewayContext(): GatewayContext | undefined {
  return gatewayAls.getStore();
}

/**
 * Merge updates into the current context in-place.
 * No-op outside runWithGatewayContext, so core code can call it freely.
 */
export function updateGatewayContext(
  updates: Partial<GatewayContext>
): void {
  const current = gatewayAls.getStore();
  if (!current) return;

  const merged = mergeGatewayContext(current, updates);

  // Mutate in place so references held elsewhere stay valid.
  Object.assign(current, merged);
}
