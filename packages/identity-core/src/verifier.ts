// packages/identity-core/src/verifier.ts

import {
  createRemoteJWKSet,
  jwtVerify,
  type JWTPayload,
  type JWTVerifyGetKey,
} from "jose";

import { describeError, silentLogger, type Logger } from "@gatehouse/audit";
import type { GatewayIdentity } from "@gatehouse/request-context";

import { mapPayloadToIdentity, type ClaimMapping } from "./claims";
import type { RevocationStore } from "./revocation";

export const DEFAULT_IDENTITY_TIMEOUT_MS = 5_000;

export interface IdentityCoreConfig extends ClaimMapping {
  issuer: string;
  /** Checked only when set. */
  audience?: string | string[];
  /** Defaults to the Keycloak certs endpoint under the issuer. */
  jwksUri?: string;
  /** Key resolver to use instead of fetching jwksUri. */
  jwks?: JWTVerifyGetKey;
  /** Bound on a key-set fetch. */
  timeoutMs?: number;
  algorithms?: string[];
  clockTolerance?: string | number;
  revocations?: RevocationStore;
  logger?: Logger;
}

export interface VerifySuccess {
  ok: true;
  identity: GatewayIdentity;
  payload: JWTPayload;
}

export type VerifyErrorCode = "invalid_token" | "token_revoked";

export interface VerifyFailure {
  ok: false;
  error: VerifyErrorCode;
  detail?: string;
}

export type VerifyResult = VerifySuccess | VerifyFailure;

export type TokenVerifier = (token: string) => Promise<VerifyResult>;

function escapeForRegex(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Match the issuer with or without a trailing slash.
 */
function buildIssuerPattern(issuer: string): RegExp {
  const issuerNoSlash = issuer.replace(/\/+$/, "");
  return new RegExp(`^${escapeForRegex(issuerNoSlash)}\\/?$`);
}

/**
 * Returns a verifier usable from any framework. It never throws: key-set
 * outages, bad signatures and revocation-store failures all come back as
 * a failed result.
 */
export function createIdentityVerifier(config: IdentityCoreConfig): TokenVerifier {
  const issuerNoSlash = config.issuer.replace(/\/+$/, "");
  const issuerPattern = buildIssuerPattern(config.issuer);
  const logger = config.logger ?? silentLogger;

  const jwks =
    config.jwks ??
    createRemoteJWKSet(
      new URL(config.jwksUri ?? `${issuerNoSlash}/protocol/openid-connect/certs`),
      { timeoutDuration: config.timeoutMs ?? DEFAULT_IDENTITY_TIMEOUT_MS }
    );

  return async (token: string): Promise<VerifyResult> => {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, jwks, {
        audience: config.audience,
        algorithms: config.algorithms ?? ["RS256"],
        clockTolerance: config.clockTolerance ?? "60s",
      }));
    } catch (e: unknown) {
      logger.debug("token rejected", { reason: describeError(e) });
      return { ok: false, error: "invalid_token", detail: describeError(e) };
    }

    const iss = String(payload.iss ?? "");
    if (!issuerPattern.test(iss)) {
      return {
        ok: false,
        error: "invalid_token",
        detail: `unexpected "iss" claim value: ${iss}`,
      };
    }

    if (config.revocations) {
      try {
        if (await config.revocations.isRevoked(token)) {
          return { ok: false, error: "token_revoked", detail: "token has been revoked" };
        }
      } catch (e: unknown) {
        logger.warn("revocation check failed, rejecting token", { reason: describeError(e) });
        return { ok: false, error: "invalid_token", detail: "revocation status unavailable" };
      }
    }

    try {
      return { ok: true, identity: mapPayloadToIdentity(payload, config, issuerNoSlash), payload };
    } catch (e: unknown) {
      return { ok: false, error: "invalid_token", detail: describeError(e) };
    }
  };
}

/**
 * Pull the token out of an Authorization header. The scheme is matched
 * case-insensitively.
 */
export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match ? match[1] : undefined;
}
