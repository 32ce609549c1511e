// packages/gateway/src/context.ts

import type { RequestHandler } from "express";

import { bindGatewayContext, createGatewayContext } from "@gatehouse/request-context";

/**
 * First middleware on the app: creates this request's GatewayContext,
 * exposes it on req.gateway and res.locals, and echoes the request id.
 */
export function gatewayContext(): RequestHandler {
  return (req, res, next) => {
    const ctx = createGatewayContext({
      request: {
        method: req.method,
        path: req.path,
        ip: req.ip ?? req.socket.remoteAddress,
        origin: req.get("origin"),
        userAgent: req.get("user-agent"),
      },
    });

    req.gateway = ctx;
    res.locals.gatewayContext = ctx;
    res.locals.requestId = ctx.request.requestId;
    res.setHeader("X-Request-ID", ctx.request.requestId);

    bindGatewayContext(ctx, next);
  };
}
