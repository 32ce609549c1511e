// packages/audit/src/events.ts

import type { RequestHandler } from "express";

import type {
  GatewayBreakerMeta,
  GatewayCacheMeta,
  GatewayLimitsMeta,
  GatewayRoutingMeta,
  RateLimitTier,
} from "@gatehouse/request-context";

import { createLogger, describeError, type Logger } from "./logger";

/**
 * Summary of one finished request. Carries the caller's subject and tier,
 * never the token or its claims.
 */
export interface AuditEvent {
  ts: string;
  kind: "gateway.request";
  serviceName: string;
  environment: string;
  requestId?: string;
  http: {
    method: string;
    path: string;
    status: number;
    latencyMs: number;
  };
  caller?: { sub: string; tier: RateLimitTier };
  routing?: GatewayRoutingMeta;
  limits?: GatewayLimitsMeta;
  cache?: GatewayCacheMeta;
  breaker?: GatewayBreakerMeta;
}

export type AuditSink = (event: AuditEvent) => void;

export interface AuditMiddlewareOptions {
  /** Defaults to "gateway-server". */
  serviceName?: string;
  /** Defaults to NODE_ENV, then "dev". */
  environment?: string;
  /** Where sink failures are reported. */
  logger?: Logger;
}

/** Writes each event as `[audit] {json}` on one line. */
export function createConsoleAuditSink(
  write: (line: string) => void = (line) => console.log(line)
): AuditSink {
  return (event) => write(`[audit] ${JSON.stringify(event)}`);
}

/**
 * Hands one AuditEvent per response to `sink`, built from the request's
 * GatewayContext once the response has been flushed.
 */
export function auditLoggingMiddleware(
  sink: AuditSink,
  options: AuditMiddlewareOptions = {}
): RequestHandler {
  const serviceName = options.serviceName ?? "gateway-server";
  const environment = options.environment ?? process.env.NODE_ENV ?? "dev";
  const logger = options.logger ?? createLogger("audit");

  return (req, res, next) => {
    const started = performance.now();

    res.once("finish", () => {
      const ctx = req.gateway;
      const caller = ctx?.identity;
      const event: AuditEvent = {
        ts: new Date().toISOString(),
        kind: "gateway.request",
        serviceName,
        environment,
        requestId: ctx?.request.requestId,
        http: {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          latencyMs: Math.round(performance.now() - started),
        },
        caller: caller ? { sub: caller.sub, tier: caller.tier } : undefined,
        routing: ctx?.routing,
        limits: ctx?.limits,
        cache: ctx?.cache,
        breaker: ctx?.breaker,
      };

      try {
        sink(event);
      } catch (err: unknown) {
        logger.error("audit sink failed", {
          requestId: event.requestId,
          error: describeError(err),
        });
      }
    });

    next();
  };
}
