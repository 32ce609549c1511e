// packages/admission/src/requireRole.ts

import type { RequestHandler } from "express";

import { hasAnyRole } from "@gatehouse/admission-core";
import { ForbiddenError, UnauthorizedError } from "@gatehouse/gateway-core";

/**
 * Requires an authenticated caller holding at least one of `roles`.
 * Mount after the bearer-auth middleware.
 */
export function requireRole(...roles: string[]): RequestHandler {
  return (req, _res, next) => {
    if (!req.user) {
      next(new UnauthorizedError("Missing bearer token", 'Bearer realm="gateway"'));
      return;
    }
    if (!hasAnyRole(req.user.roles, roles)) {
      next(new ForbiddenError("Insufficient permissions", { required: roles }));
      return;
    }
    next();
  };
}
