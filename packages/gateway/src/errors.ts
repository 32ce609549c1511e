// packages/gateway/src/errors.ts

import type { ErrorRequestHandler } from "express";

import { describeError, silentLogger, type Logger } from "@gatehouse/audit";
import {
  PayloadTooLargeError,
  renderGatewayError,
  toGatewayError,
  type GatewayError,
} from "@gatehouse/gateway-core";

function isBodyTooLarge(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.too.large"
  );
}

function classify(err: unknown): GatewayError {
  if (isBodyTooLarge(err)) return new PayloadTooLargeError("Request body exceeds the payload limit");
  return toGatewayError(err);
}

/**
 * Terminal error handler. Renders every error as
 * `{ ok: false, error: { code, message, details? }, requestId }`.
 */
export function gatewayErrorHandler(options: { logger?: Logger } = {}): ErrorRequestHandler {
  const logger = options.logger ?? silentLogger;

  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const gatewayError = classify(err);
    const requestId =
      typeof res.locals.requestId === "string" ? res.locals.requestId : req.gateway?.request.requestId;

    if (gatewayError.code === "GATEWAY_ERROR") {
      logger.error("unhandled error", {
        requestId,
        method: req.method,
        path: req.path,
        error: describeError(err),
      });
    }

    const rendered = renderGatewayError(gatewayError, requestId);
    res.status(rendered.status).set(rendered.headers).json(rendered.body);
  };
}
