// packages/gateway/src/router.ts

import bodyParser from "body-parser";
import { Router, type Request, type Response, type NextFunction } from "express";

import { parseContentLength } from "@gatehouse/admission-core";
import { silentLogger, type Logger } from "@gatehouse/audit";
import type { GatewayPipeline, GatewayRequest } from "@gatehouse/gateway-core";
import type { QueryInput } from "@gatehouse/cache";
import {
  bindGatewayContext,
  createGatewayContext,
  type GatewayContext,
} from "@gatehouse/request-context";

export interface GatewayRouterOptions {
  logger?: Logger;
}

function queryFromUrl(originalUrl: string): QueryInput {
  const out: Record<string, string[]> = {};
  for (const [key, value] of new URL(originalUrl, "http://gateway.invalid").searchParams) {
    (out[key] ??= []).push(value);
  }
  const query: QueryInput = {};
  for (const [key, values] of Object.entries(out)) {
    query[key] = values.length === 1 ? values[0] : values;
  }
  return query;
}

function toGatewayRequest(req: Request, ctx: GatewayContext, signal: AbortSignal): GatewayRequest {
  return {
    method: req.method,
    path: req.path,
    query: queryFromUrl(req.originalUrl),
    headers: req.headers,
    body: Buffer.isBuffer(req.body) ? req.body : undefined,
    declaredLength: parseContentLength(req.get("content-length")),
    ip: req.ip ?? req.socket.remoteAddress,
    requestId: ctx.request.requestId,
    signal,
  };
}

function cacheHeader(ctx: GatewayContext, source: "backend" | "cache"): string {
  if (source === "cache") return "HIT";
  return ctx.cache?.status === "miss" ? "MISS" : "BYPASS";
}

/**
 * Catch-all router that hands every request to the pipeline.
 * Errors go to next() for gatewayErrorHandler to render. Mount
 * admissionGuard ahead of it so unwelcome uploads are refused unread.
 */
export function createGatewayRouter(
  pipeline: GatewayPipeline,
  options: GatewayRouterOptions = {}
): Router {
  const router = Router();
  const logger = options.logger ?? silentLogger;
  const { admission } = pipeline.config;

  router.use(bodyParser.raw({ type: () => true, limit: admission.maxPayloadBytes }));

  router.all("*", (req: Request, res: Response, next: NextFunction) => {
    const ctx = req.gateway ?? createGatewayContext({ request: { method: req.method, path: req.path } });

    const clientGone = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) clientGone.abort();
    });

    bindGatewayContext(ctx, () => pipeline.handle(toGatewayRequest(req, ctx, clientGone.signal)))
      .then((result) => {
        if (clientGone.signal.aborted || res.headersSent) {
          logger.debug("response discarded, client disconnected", {
            requestId: ctx.request.requestId,
            status: result.status,
          });
          return;
        }
        res.status(result.status);
        for (const [name, value] of Object.entries(result.headers)) {
          res.setHeader(name, value);
        }
        res.setHeader("X-Cache", cacheHeader(ctx, result.source));
        res.end(result.body);
      })
      .catch(next);
  });

  return router;
}
