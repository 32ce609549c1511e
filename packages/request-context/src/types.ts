// packages/request-context/src/types.ts

/**
 * Where the identity came from. Open-ended so other IdPs can be added
 * without changing the lib.
 */
export type IdentitySource =
  | "keycloak"
  | "oidc"
  | "anonymous"
  | string;

/**
 * Rate-limit tier resolved from the caller's claims.
 */
export type RateLimitTier = "standard" | "premium";

/**
 * Canonical caller identity used across all layers.
 * This is what the identity layer outputs.
 */
export interface GatewayIdentity {
  /** Canonical subject. The OIDC sub claim. */
  sub: string;

  /** Normalized issuer (no trailing slash). */
  issuer: string;

  email?: string;
  name?: string;

  roles: string[];
  scopes: string[];

  tier: RateLimitTier;

  /** Token expiry (epoch ms), when the token carries one. */
  expiresAt?: number;

  source: IdentitySource;

  /** Original decoded JWT payload. */
  raw: Record<string, unknown>;
}

/**
 * Basic HTTP request metadata that is useful to all layers.
 */
export interface GatewayRequestMeta {
  /** Correlation id for this gateway hop. */
  requestId: string;

  /** ISO timestamp of when the gateway received the request. */
  startedAt: string;

  method: string;
  path: string;

  ip?: string;
  origin?: string;
  userAgent?: string;
}

export type LimitDecision = "ok" | "throttled";

export interface GatewayLimitsMeta {
  decision?: LimitDecision;

  /** Client identity the counter was keyed on (user:… or ip:…). */
  key?: string;
  tier?: RateLimitTier;

  limit?: number;
  remaining?: number;
  resetAt?: string; // ISO
}

export interface GatewayRoutingMeta {
  /** Backend service name the route resolved to. */
  service?: string;
  /** Route prefix (or header) that matched. */
  matchedBy?: string;
  /** Instance base URL the selector picked. */
  instance?: string;
  upstreamStatus?: number;
  latencyMs?: number;
}

export type CacheStatus = "hit" | "miss" | "bypass";

export interface GatewayCacheMeta {
  status?: CacheStatus;
  fingerprint?: string;
  stored?: boolean;
}

export interface GatewayBreakerMeta {
  /** Breaker state observed when the request was admitted or refused. */
  state?: "closed" | "open" | "half_open";
  trial?: boolean;
  outcome?: "success" | "failure";
}

export interface GatewayContext {
  /** HTTP-level metadata about this request. */
  request: GatewayRequestMeta; // always present once context is created

  /** Who is calling? Filled by the identity layer. */
  identity?: GatewayIdentity;

  limits?: GatewayLimitsMeta;
  routing?: GatewayRoutingMeta;
  cache?: GatewayCacheMeta;
  breaker?: GatewayBreakerMeta;

  /** Escape hatch for extensions. */
  extras?: Record<string, unknown>;
}
