// packages/identity/src/bearer.ts

import type { RequestHandler } from "express";

import { describeError, silentLogger, type Logger } from "@gatehouse/audit";
import { UnauthorizedError } from "@gatehouse/gateway-core";
import { extractBearerToken, type TokenVerifier } from "@gatehouse/identity-core";
import { updateGatewayContext } from "@gatehouse/request-context";

export interface BearerAuthOptions {
  verify: TokenVerifier;
  logger?: Logger;
}

/**
 * Express middleware:
 * - Reads the bearer token from the Authorization header
 * - Verifies it
 * - Stores the identity in GatewayContext and req.user
 */
export function identity(options: BearerAuthOptions): RequestHandler {
  const logger = options.logger ?? silentLogger;

  return (req, _res, next) => {
    const token = extractBearerToken(req.get("authorization"));
    if (!token) {
      next(new UnauthorizedError("Missing bearer token", 'Bearer realm="gateway"'));
      return;
    }

    options
      .verify(token)
      .then((result) => {
        if (!result.ok) {
          next(
            new UnauthorizedError(
              result.error === "token_revoked" ? "Token has been revoked" : "Invalid or expired token"
            )
          );
          return;
        }
        req.user = result.identity;
        if (req.gateway) req.gateway.identity = result.identity;
        updateGatewayContext({ identity: result.identity });
        next();
      })
      .catch((err: unknown) => {
        logger.warn("token verification errored, rejecting", { error: describeError(err) });
        next(new UnauthorizedError("Token could not be verified"));
      });
  };
}
