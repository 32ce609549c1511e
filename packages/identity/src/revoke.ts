// packages/identity/src/revoke.ts

import { Router } from "express";

import { silentLogger, type Logger } from "@gatehouse/audit";
import { UnauthorizedError } from "@gatehouse/gateway-core";
import { extractBearerToken, type RevocationStore, type TokenVerifier } from "@gatehouse/identity-core";

import { identity } from "./bearer";

export interface RevokeRoutesOptions {
  verify: TokenVerifier;
  revocations: RevocationStore;
  logger?: Logger;
}

/**
 * POST /auth/revoke: the caller revokes the token it presents.
 * The entry lives until the token would have expired anyway.
 */
export function revokeRoutes(options: RevokeRoutesOptions): Router {
  const router = Router();
  const logger = options.logger ?? silentLogger;

  router.post("/auth/revoke", identity(options), (req, res, next) => {
    const token = extractBearerToken(req.get("authorization"));
    const user = req.user;
    if (!token || !user) {
      next(new UnauthorizedError("Missing bearer token", 'Bearer realm="gateway"'));
      return;
    }

    options.revocations
      .revoke(token, user.expiresAt)
      .then(() => {
        logger.info("token revoked", { sub: user.sub, requestId: req.gateway?.request.requestId });
        res.json({ ok: true, revoked: true });
      })
      .catch(next);
  });

  return router;
}
