// packages/admission/src/guard.ts

import type { RequestHandler } from "express";

import {
  checkPayloadSize,
  checkSource,
  parseContentLength,
  type SourcePolicy,
} from "@gatehouse/admission-core";
import { ForbiddenError, PayloadTooLargeError } from "@gatehouse/gateway-core";

export interface AdmissionGuardOptions extends SourcePolicy {
  maxPayloadBytes: number;
}

/**
 * Source and declared-size checks that run before the body is read, so an
 * oversized or unwelcome upload is refused without buffering it.
 */
export function admissionGuard(options: AdmissionGuardOptions): RequestHandler {
  return (req, _res, next) => {
    const source = checkSource(options, {
      ip: req.ip ?? req.socket.remoteAddress,
      origin: req.get("origin"),
    });
    if (!source.ok) {
      next(new ForbiddenError(source.reason));
      return;
    }

    const size = checkPayloadSize(options.maxPayloadBytes, {
      declared: parseContentLength(req.get("content-length")),
    });
    if (!size.ok) {
      next(new PayloadTooLargeError(size.reason));
      return;
    }

    next();
  };
}
