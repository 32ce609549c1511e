// packages/gateway-core/src/pipeline.ts

import { randomUUID } from "node:crypto";

import {
  checkOwnership,
  checkPayloadSize,
  checkSource,
  clientIdentity,
  hasAnyRole,
} from "@gatehouse/admission-core";
import { describeError, silentLogger, type Logger } from "@gatehouse/audit";
import type { CircuitBreakerRegistry } from "@gatehouse/breaker";
import {
  fingerprint,
  isCacheableRequest,
  isCacheableResponse,
  type QueryInput,
  type ResponseCache,
} from "@gatehouse/cache";
import { systemClock, type Clock } from "@gatehouse/clock";
import {
  extractBearerToken,
  type TokenVerifier,
  type VerifyResult,
} from "@gatehouse/identity-core";
import {
  rateLimitHeaders,
  type FixedWindowRateLimiter,
  type RateLimitDecision,
} from "@gatehouse/limiter";
import {
  getGatewayContext,
  updateGatewayContext,
  type GatewayIdentity,
} from "@gatehouse/request-context";
import {
  headerText,
  sanitizeJsonBody,
  scrubRequestHeaders,
  type IncomingHeaders,
  type ResponseHeaders,
} from "@gatehouse/transform";

import type { GatewayConfig, RouteConfig } from "./config";
import {
  BackendError,
  BackendTimeoutError,
  ForbiddenError,
  PayloadTooLargeError,
  RouteNotFoundError,
  ServiceUnavailableError,
  TooManyRequestsError,
  UnauthorizedError,
} from "./errors";
import { forwardRequest, type FetchLike, type UpstreamResult } from "./forwarder";
import type { InstanceHealthMonitor } from "./health-monitor";
import { SERVICE_TYPE_HEADER, normalizeRequestPath, resolveRoute } from "./routes";
import { BackendSelector } from "./selector";

/** Framework-neutral inbound request. Header names are lower-case. */
export interface GatewayRequest {
  method: string;
  path: string;
  query?: QueryInput;
  headers: IncomingHeaders;
  body?: Buffer;
  /** Content-Length as declared by the client. */
  declaredLength?: number;
  ip?: string;
  requestId?: string;
  /** Fires when the client goes away. The backend call is not cancelled. */
  signal?: AbortSignal;
}

export interface GatewayResponse {
  status: number;
  headers: ResponseHeaders;
  body: Buffer;
  source: "backend" | "cache";
}

/** Request headers that split cache entries. */
export const CACHE_VARY_HEADERS = ["accept", "accept-language"];

export interface GatewayPipelineOptions {
  config: GatewayConfig;
  verifier: TokenVerifier;
  limiter: FixedWindowRateLimiter;
  breakers: CircuitBreakerRegistry;
  cache: ResponseCache;
  selector?: BackendSelector;
  health?: InstanceHealthMonitor;
  fetch?: FetchLike;
  clock?: Clock;
  logger?: Logger;
}

function headerValue(headers: IncomingHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * The gateway's request path, in order: source check, payload size, route,
 * authentication, rate limit, authorization, cache, circuit breaker,
 * backend selection and forwarding. Each refusal is a GatewayError.
 */
export class GatewayPipeline {
  readonly config: GatewayConfig;
  readonly breakers: CircuitBreakerRegistry;
  readonly cache: ResponseCache;
  readonly limiter: FixedWindowRateLimiter;
  private readonly verifier: TokenVerifier;
  private readonly selector: BackendSelector;
  private readonly health?: InstanceHealthMonitor;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly instances: Map<string, string[]>;

  constructor(options: GatewayPipelineOptions) {
    this.config = options.config;
    this.verifier = options.verifier;
    this.limiter = options.limiter;
    this.breakers = options.breakers;
    this.cache = options.cache;
    this.selector = options.selector ?? new BackendSelector();
    this.health = options.health;
    this.fetchImpl = options.fetch ?? fetch;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.instances = new Map(options.config.services.map((s) => [s.name, s.instances]));
  }

  get serviceNames(): ReadonlySet<string> {
    return new Set(this.instances.keys());
  }

  async handle(req: GatewayRequest): Promise<GatewayResponse> {
    const requestId =
      req.requestId ?? getGatewayContext()?.request.requestId ?? `gw_${randomUUID()}`;
    const { admission } = this.config;

    const source = checkSource(admission, {
      ip: req.ip,
      origin: headerValue(req.headers, "origin"),
    });
    if (!source.ok) throw new ForbiddenError(source.reason);

    const size = checkPayloadSize(admission.maxPayloadBytes, {
      declared: req.declaredLength,
      actual: req.body?.length,
    });
    if (!size.ok) throw new PayloadTooLargeError(size.reason);

    const path = normalizeRequestPath(req.path);
    const resolved = resolveRoute(
      this.config.routes,
      this.serviceNames,
      path,
      {
        serviceType: headerValue(req.headers, SERVICE_TYPE_HEADER),
        query: req.query,
        queryRules: this.config.queryRoutes,
      }
    );
    if (!resolved) throw new RouteNotFoundError(path);
    const { route } = resolved;
    updateGatewayContext({ routing: { service: route.service, matchedBy: resolved.matchedBy } });

    const identity = route.public ? undefined : await this.authenticate(req);

    const decision = await this.admitRate(identity, req.ip);
    if (decision && !decision.allowed) {
      throw new TooManyRequestsError(decision.retryAfterMs, { limit: decision.limit });
    }

    if (identity) this.authorize(route, identity, path);

    const now = this.clock.now();
    const limitHeaders = decision ? rateLimitHeaders(decision, now) : {};

    const cacheable = isCacheableRequest(req.method, route.cacheable);
    let key: string | undefined;
    if (cacheable) {
      key = fingerprint({
        method: req.method,
        path,
        query: req.query,
        headers: req.headers,
        varyHeaders: CACHE_VARY_HEADERS,
        scope: identity ? `user:${identity.sub}` : "public",
      });
      const hit = await this.cache.get(key, now);
      updateGatewayContext({ cache: { status: hit ? "hit" : "miss", fingerprint: key } });
      if (hit) {
        return {
          status: hit.status,
          headers: { ...hit.headers, ...limitHeaders },
          body: hit.body,
          source: "cache",
        };
      }
    } else {
      updateGatewayContext({ cache: { status: "bypass" } });
    }

    const upstream = await this.callBackend(route.service, { ...req, path }, requestId);
    const response = upstream.response;

    const body = sanitizeJsonBody(
      response.body,
      headerText(response.headers, "content-type"),
      this.config.sensitiveFields
    );
    const headers = { ...response.headers };

    if (req.signal?.aborted) {
      this.logger.debug("client went away before the backend answered", {
        requestId,
        service: route.service,
      });
    }

    if (key !== undefined && isCacheableResponse(response.status, headers)) {
      await this.cache.put(
        key,
        { status: response.status, headers, body },
        this.clock.now(),
        route.cacheTtlMs ?? this.cache.defaultTtlMs
      );
      updateGatewayContext({ cache: { stored: true } });
    }

    return {
      status: response.status,
      headers: { ...headers, ...limitHeaders },
      body,
      source: "backend",
    };
  }

  private async authenticate(req: GatewayRequest): Promise<GatewayIdentity> {
    const token = extractBearerToken(headerValue(req.headers, "authorization"));
    if (!token) {
      throw new UnauthorizedError("Missing bearer token", 'Bearer realm="gateway"');
    }

    let result: VerifyResult;
    try {
      result = await this.verifier(token);
    } catch (err: unknown) {
      this.logger.warn("token verification errored, rejecting", { error: describeError(err) });
      throw new UnauthorizedError("Token could not be verified");
    }
    if (!result.ok) {
      throw new UnauthorizedError(
        result.error === "token_revoked" ? "Token has been revoked" : "Invalid or expired token"
      );
    }

    updateGatewayContext({ identity: result.identity });
    return result.identity;
  }

  /**
   * Counter-store outages admit the request; the outage is logged.
   */
  private async admitRate(
    identity: GatewayIdentity | undefined,
    ip: string | undefined
  ): Promise<RateLimitDecision | undefined> {
    const key = clientIdentity(identity?.sub, ip);
    const tier = identity?.tier ?? "standard";

    let decision: RateLimitDecision;
    try {
      decision = await this.limiter.admit(key, tier);
    } catch (err: unknown) {
      this.logger.warn("rate limit store unavailable, admitting request", {
        key,
        error: describeError(err),
      });
      return undefined;
    }

    updateGatewayContext({
      limits: {
        decision: decision.allowed ? "ok" : "throttled",
        key,
        tier,
        limit: decision.limit,
        remaining: decision.remaining,
        resetAt: new Date(decision.resetAt).toISOString(),
      },
    });
    return decision;
  }

  private authorize(route: RouteConfig, identity: GatewayIdentity, path: string): void {
    if (!hasAnyRole(identity.roles, route.roles)) {
      throw new ForbiddenError("Insufficient permissions", { required: route.roles });
    }
    if (route.ownerSegment !== undefined) {
      const owned = checkOwnership({
        path,
        sub: identity.sub,
        roles: identity.roles,
        ownerSegment: route.ownerSegment,
      });
      if (!owned.ok) throw new ForbiddenError(`Access denied: ${owned.reason}`);
    }
  }

  /**
   * Breaker admission, instance selection and the upstream call. The
   * breaker permit is released exactly once, whatever happens.
   */
  private async callBackend(
    service: string,
    req: GatewayRequest,
    requestId: string
  ): Promise<Extract<UpstreamResult, { kind: "response" }>> {
    const permit = this.breakers.acquire(service);
    if (!permit) {
      updateGatewayContext({ breaker: { state: this.breakers.state(service) } });
      throw new ServiceUnavailableError(service);
    }
    updateGatewayContext({
      breaker: { state: permit.trial ? "half_open" : "closed", trial: permit.trial },
    });

    const settle = (success: boolean) => {
      if (permit.released) return;
      this.breakers.release(permit, success);
      updateGatewayContext({ breaker: { outcome: success ? "success" : "failure" } });
    };

    try {
      const instance = this.selector.select(
        service,
        this.health ? this.health.healthyInstances(service) : this.instances.get(service) ?? []
      );
      updateGatewayContext({ routing: { instance } });

      const result = await forwardRequest(this.fetchImpl, {
        baseUrl: instance,
        method: req.method,
        path: req.path,
        query: req.query,
        headers: scrubRequestHeaders(req.headers, { requestId }),
        body: req.body,
        timeoutMs: this.config.backendTimeoutMs,
      });
      updateGatewayContext({ routing: { latencyMs: result.latencyMs } });

      if (result.kind === "timeout") {
        settle(false);
        this.logger.warn("backend timed out", { service, instance, requestId });
        throw new BackendTimeoutError(service, this.config.backendTimeoutMs);
      }
      if (result.kind === "network") {
        settle(false);
        this.logger.warn("backend unreachable", {
          service,
          instance,
          requestId,
          error: describeError(result.error),
        });
        throw new BackendError(service, "connection failed", { cause: result.error });
      }

      const { status } = result.response;
      updateGatewayContext({ routing: { upstreamStatus: status } });
      if (status >= 500) {
        settle(false);
        this.logger.warn("backend error response", { service, instance, status, requestId });
        throw new BackendError(service, `upstream responded ${status}`, { status });
      }

      settle(true);
      return result;
    } finally {
      // Selection failures and anything unexpected count against the service.
      settle(false);
    }
  }
}
