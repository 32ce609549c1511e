// packages/gateway-core/src/routes.ts

import type { QueryInput } from "@gatehouse/cache";

import type { QueryRouteRule, RouteConfig } from "./config";

export const SERVICE_TYPE_HEADER = "x-service-type";

export interface ResolvedRoute {
  route: RouteConfig;
  /** The prefix, `header:<service>` or `query:<param>=<value>`. */
  matchedBy: string;
}

/** Fallbacks consulted, in this order, when no prefix matches. */
export interface RouteHints {
  serviceType?: string;
  query?: QueryInput;
  queryRules?: readonly QueryRouteRule[];
}

function fallbackRoute(service: string): RouteConfig {
  return { prefix: "/", service, roles: [], cacheable: false, public: false };
}

function queryHas(query: QueryInput, param: string, value: string): boolean {
  const actual = query[param];
  return Array.isArray(actual) ? actual.includes(value) : actual === value;
}

function matchesPrefix(path: string, prefix: string): boolean {
  if (prefix === "/") return true;
  return path === prefix || path.startsWith(`${prefix}/`);
}

/**
 * Longest matching prefix wins. A path no prefix claims may still reach a
 * configured service through X-Service-Type, then through the first
 * matching query rule; such a request gets a default route
 * (authenticated, no role requirement, not cached).
 */
export function resolveRoute(
  routes: readonly RouteConfig[],
  serviceNames: ReadonlySet<string>,
  path: string,
  hints: RouteHints = {}
): ResolvedRoute | undefined {
  let best: RouteConfig | undefined;
  for (const route of routes) {
    if (!matchesPrefix(path, route.prefix)) continue;
    if (!best || route.prefix.length > best.prefix.length) best = route;
  }
  if (best) return { route: best, matchedBy: best.prefix };

  const requested = hints.serviceType?.trim();
  if (requested && serviceNames.has(requested)) {
    return { route: fallbackRoute(requested), matchedBy: `header:${requested}` };
  }

  const { query } = hints;
  if (query) {
    for (const rule of hints.queryRules ?? []) {
      if (serviceNames.has(rule.service) && queryHas(query, rule.param, rule.value)) {
        return { route: fallbackRoute(rule.service), matchedBy: `query:${rule.param}=${rule.value}` };
      }
    }
  }
  return undefined;
}

/**
 * Resolve dot segments (plain or percent-encoded) and drop any scheme or
 * host smuggled into the path, so routing and forwarding see the same path
 * the backend will.
 */
export function normalizeRequestPath(raw: string): string {
  const path = "/" + raw.replace(/^\/+/, "");
  return new URL(path, "http://gateway.invalid").pathname;
}
