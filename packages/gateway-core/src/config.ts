// packages/gateway-core/src/config.ts

import { z } from "zod";

import { DEFAULT_MAX_PAYLOAD_BYTES } from "@gatehouse/admission-core";
import type { LogLevel } from "@gatehouse/audit";
import { keycloakIssuer, keycloakJwksUri } from "@gatehouse/identity-core";
import { DEFAULT_SENSITIVE_FIELDS } from "@gatehouse/transform";

export interface EnvLike {
  [key: string]: string | undefined;
}

export interface ServiceConfig {
  name: string;
  /** Instance base URLs, in rotation order. */
  instances: string[];
  /** Path probed by the health monitor. */
  healthPath: string;
}

export interface RouteConfig {
  /** Path prefix, matched on segment boundaries. */
  prefix: string;
  service: string;
  /** Caller needs at least one of these. Empty means any authenticated caller. */
  roles: string[];
  /** Index of the path segment that must equal the caller's subject. */
  ownerSegment?: number;
  cacheable: boolean;
  /** Skip authentication. */
  public: boolean;
  /** Per-route cache TTL. Falls back to the cache default. */
  cacheTtlMs?: number;
}

/** Sends requests no prefix claims to `service` when `?param=value`. */
export interface QueryRouteRule {
  param: string;
  value: string;
  service: string;
}

export interface IdentityConfig {
  issuer: string;
  audience?: string;
  jwksUri: string;
  timeoutMs: number;
}

export interface AdmissionConfig {
  allowedIps: string[];
  allowedOrigins: string[];
  maxPayloadBytes: number;
  trustProxy: boolean;
}

export interface RateLimitConfig {
  limit: number;
  windowMs: number;
  premiumLimit?: number;
  premiumMultiplier: number;
}

export interface GatewayConfig {
  identity: IdentityConfig;
  admission: AdmissionConfig;
  rateLimit: RateLimitConfig;
  cache: { ttlMs: number; maxEntries: number };
  breaker: { failureThreshold: number; recoveryTimeoutMs: number };
  backendTimeoutMs: number;
  healthCheckIntervalMs: number;
  services: ServiceConfig[];
  routes: RouteConfig[];
  queryRoutes: QueryRouteRule[];
  sensitiveFields: string[];
  redisUrl?: string;
  logLevel: LogLevel;
  port: number;
}

export class GatewayConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid gateway configuration: ${issues.join("; ")}`);
    this.name = "GatewayConfigError";
  }
}

export function trimTrailingSlashes(input: string): string {
  let out = input;
  while (out.endsWith("/")) {
    out = out.slice(0, -1);
  }
  return out;
}

const csv = z
  .string()
  .transform((s) => s.split(",").map((part) => part.trim()).filter(Boolean));

const urlList = csv.pipe(z.array(z.string().url()).min(1));

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

function jsonOf<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((raw, ctx): unknown => {
      try {
        return JSON.parse(raw);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not valid JSON" });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

const servicesJsonSchema = z.record(
  z.object({
    urls: z.array(z.string().url()).min(1),
    healthPath: z.string().startsWith("/").default("/health"),
  })
);

const routesJsonSchema = z.array(
  z.object({
    prefix: z.string().startsWith("/"),
    service: z.string().min(1),
    roles: z.array(z.string().min(1)).default([]),
    ownerSegment: z.number().int().nonnegative().optional(),
    cacheable: z.boolean().default(false),
    public: z.boolean().default(false),
    cacheTtlMs: z.number().int().positive().optional(),
  })
);

const queryRoutesJsonSchema = z.array(
  z.object({
    param: z.string().min(1),
    value: z.string(),
    service: z.string().min(1),
  })
);

const envSchema = z.object({
  KEYCLOAK_URL: z.string().url().default("http://localhost:8080"),
  KEYCLOAK_REALM: z.string().min(1).default("master"),
  OAUTH_ISSUER: z.string().url().optional(),
  OAUTH_AUDIENCE: z.string().min(1).optional(),
  OAUTH_JWKS_URI: z.string().url().optional(),
  IDENTITY_TIMEOUT_MS: positiveInt.default(5000),

  ALLOWED_ORIGINS: csv.default("http://localhost:3000"),
  ALLOWED_IPS: csv.default("127.0.0.1,::1"),
  TRUST_PROXY: flag.default("false"),
  MAX_PAYLOAD_SIZE: positiveInt.default(DEFAULT_MAX_PAYLOAD_BYTES),

  RATE_LIMIT_REQUESTS: positiveInt.default(100),
  RATE_LIMIT_WINDOW: positiveInt.default(60),
  PREMIUM_RATE_LIMIT: positiveInt.optional(),
  RATE_LIMIT_PREMIUM_MULTIPLIER: z.coerce.number().positive().default(10),

  CACHE_TTL: nonNegativeInt.default(300),
  CACHE_MAX_ENTRIES: positiveInt.default(1000),

  CIRCUIT_BREAKER_FAILURE_THRESHOLD: positiveInt.default(5),
  CIRCUIT_BREAKER_RECOVERY_TIMEOUT: nonNegativeInt.default(60),
  BACKEND_TIMEOUT_MS: positiveInt.default(30_000),
  HEALTH_CHECK_INTERVAL_MS: nonNegativeInt.default(0),

  REDIS_URL: z.string().url().optional(),

  USER_SERVICE_URLS: urlList.default("http://localhost:8001,http://localhost:8002"),
  ORDER_SERVICE_URLS: urlList.default("http://localhost:8003"),
  SERVICES_JSON: jsonOf(servicesJsonSchema).optional(),
  ROUTES_JSON: jsonOf(routesJsonSchema).optional(),
  QUERY_ROUTES_JSON: jsonOf(queryRoutesJsonSchema).optional(),

  SENSITIVE_FIELDS: csv.optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
});

export const DEFAULT_ROUTES: RouteConfig[] = [
  { prefix: "/api/admin", service: "user-service", roles: ["admin"], cacheable: false, public: false },
  {
    prefix: "/api/user",
    service: "user-service",
    roles: ["user", "admin"],
    ownerSegment: 2,
    cacheable: false,
    public: false,
  },
  { prefix: "/api/order", service: "order-service", roles: [], cacheable: false, public: false },
  { prefix: "/api/public", service: "user-service", roles: [], cacheable: true, public: false },
  { prefix: "/api/config", service: "user-service", roles: [], cacheable: true, public: false },
  { prefix: "/api/health", service: "user-service", roles: [], cacheable: true, public: true },
];

export const DEFAULT_QUERY_ROUTES: QueryRouteRule[] = [
  { param: "region", value: "us", service: "user-service" },
];

/**
 * Treat empty strings as unset so `FOO=` falls back to the default.
 */
function withoutBlanks(env: EnvLike): EnvLike {
  const out: EnvLike = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

/**
 * Builds and validates a GatewayConfig from process.env-style variables.
 * Seconds-based variables are converted to milliseconds here.
 * Throws GatewayConfigError listing every problem found.
 */
export function configFromEnv(env: EnvLike = process.env): GatewayConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new GatewayConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  const keycloakUrl = trimTrailingSlashes(e.KEYCLOAK_URL);
  const issuer = trimTrailingSlashes(e.OAUTH_ISSUER ?? keycloakIssuer(keycloakUrl, e.KEYCLOAK_REALM));
  const jwksUri =
    e.OAUTH_JWKS_URI ??
    (e.OAUTH_ISSUER
      ? `${issuer}/protocol/openid-connect/certs`
      : keycloakJwksUri(keycloakUrl, e.KEYCLOAK_REALM));

  const services = new Map<string, ServiceConfig>();
  const addService = (name: string, urls: string[], healthPath = "/health") => {
    services.set(name, { name, instances: urls.map(trimTrailingSlashes), healthPath });
  };
  addService("user-service", e.USER_SERVICE_URLS);
  addService("order-service", e.ORDER_SERVICE_URLS);
  for (const [name, svc] of Object.entries(e.SERVICES_JSON ?? {})) {
    addService(name, svc.urls, svc.healthPath);
  }

  const routes: RouteConfig[] = e.ROUTES_JSON
    ? e.ROUTES_JSON.map((r) => ({ ...r, prefix: normalizePrefix(r.prefix) }))
    : DEFAULT_ROUTES;

  const queryRoutes = e.QUERY_ROUTES_JSON ?? DEFAULT_QUERY_ROUTES;

  const unknown = [
    ...routes
      .filter((r) => !services.has(r.service))
      .map((r) => `ROUTES_JSON: route ${r.prefix} names unknown service ${r.service}`),
    ...queryRoutes
      .filter((r) => !services.has(r.service))
      .map((r) => `QUERY_ROUTES_JSON: rule ${r.param}=${r.value} names unknown service ${r.service}`),
  ];
  if (unknown.length > 0) {
    throw new GatewayConfigError(unknown);
  }

  return {
    identity: {
      issuer,
      audience: e.OAUTH_AUDIENCE,
      jwksUri,
      timeoutMs: e.IDENTITY_TIMEOUT_MS,
    },
    admission: {
      allowedIps: e.ALLOWED_IPS,
      allowedOrigins: e.ALLOWED_ORIGINS,
      maxPayloadBytes: e.MAX_PAYLOAD_SIZE,
      trustProxy: e.TRUST_PROXY,
    },
    rateLimit: {
      limit: e.RATE_LIMIT_REQUESTS,
      windowMs: e.RATE_LIMIT_WINDOW * 1000,
      premiumLimit: e.PREMIUM_RATE_LIMIT,
      premiumMultiplier: e.RATE_LIMIT_PREMIUM_MULTIPLIER,
    },
    cache: { ttlMs: e.CACHE_TTL * 1000, maxEntries: e.CACHE_MAX_ENTRIES },
    breaker: {
      failureThreshold: e.CIRCUIT_BREAKER_FAILURE_THRESHOLD,
      recoveryTimeoutMs: e.CIRCUIT_BREAKER_RECOVERY_TIMEOUT * 1000,
    },
    backendTimeoutMs: e.BACKEND_TIMEOUT_MS,
    healthCheckIntervalMs: e.HEALTH_CHECK_INTERVAL_MS,
    services: [...services.values()],
    routes,
    queryRoutes,
    sensitiveFields: e.SENSITIVE_FIELDS ?? DEFAULT_SENSITIVE_FIELDS,
    redisUrl: e.REDIS_URL,
    logLevel: e.LOG_LEVEL,
    port: e.PORT,
  };
}

export function normalizePrefix(prefix: string): string {
  const trimmed = trimTrailingSlashes(prefix);
  return trimmed === "" ? "/" : trimmed;
}

/**
 * Safe-to-log view of the config: URLs that may carry credentials are
 * reduced to set/unset.
 */
export function describeConfig(config: GatewayConfig): Record<string, unknown> {
  return {
    issuer: config.identity.issuer,
    audience: config.identity.audience ? "[set]" : null,
    redis: config.redisUrl ? "[set]" : "[unset]",
    services: config.services.map((s) => `${s.name}(${s.instances.length})`),
    routes: config.routes.length,
    rateLimit: `${config.rateLimit.limit}/${config.rateLimit.windowMs}ms`,
    cacheTtlMs: config.cache.ttlMs,
    breaker: config.breaker,
  };
}
