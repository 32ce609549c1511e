// packages/identity-core/src/claims.ts

import type { JWTPayload } from "jose";

import type { GatewayIdentity, IdentitySource, RateLimitTier } from "@gatehouse/request-context";

export interface ClaimMapping {
  /** Extra top-level claim holding an array of role names. */
  roleClaim?: string;
  /** Space-delimited scope claim. Defaults to "scope". */
  scopeClaim?: string;
  /** Claims whose value "premium" marks a premium caller. Defaults to ["tier", "plan"]. */
  tierClaims?: string[];
  /** Role that marks a premium caller. Defaults to "premium". */
  premiumRole?: string;
  source?: IdentitySource;
}

function stringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Roles from Keycloak's realm_access.roles, a plain "roles" claim and the
 * configured roleClaim, de-duplicated in first-seen order.
 */
export function collectRoles(payload: JWTPayload, roleClaim?: string): string[] {
  const realmAccess = payload.realm_access;
  const sources = [
    isRecord(realmAccess) ? stringArray(realmAccess.roles) : [],
    stringArray(payload.roles),
    roleClaim ? stringArray(payload[roleClaim]) : [],
  ];
  return [...new Set(sources.flat())];
}

export function resolveTier(
  payload: JWTPayload,
  roles: string[],
  mapping: Pick<ClaimMapping, "tierClaims" | "premiumRole"> = {}
): RateLimitTier {
  const tierClaims = mapping.tierClaims ?? ["tier", "plan"];
  const premiumRole = mapping.premiumRole ?? "premium";

  for (const claim of tierClaims) {
    if (payload[claim] === "premium") return "premium";
  }
  return roles.includes(premiumRole) ? "premium" : "standard";
}

export function mapPayloadToIdentity(
  payload: JWTPayload,
  mapping: ClaimMapping,
  normalizedIssuer: string
): GatewayIdentity {
  const sub = typeof payload.sub === "string" ? payload.sub : "";
  if (!sub) {
    throw new Error('missing "sub" claim in token');
  }

  const email = typeof payload.email === "string" ? payload.email : undefined;
  const name =
    typeof payload.name === "string"
      ? payload.name
      : typeof payload.preferred_username === "string"
        ? payload.preferred_username
        : undefined;

  const roles = collectRoles(payload, mapping.roleClaim);

  const rawScope = payload[mapping.scopeClaim ?? "scope"];
  const scopes = typeof rawScope === "string" ? rawScope.split(" ").filter(Boolean) : [];

  return {
    sub,
    issuer: normalizedIssuer,
    email,
    name,
    roles,
    scopes,
    tier: resolveTier(payload, roles, mapping),
    expiresAt: typeof payload.exp === "number" ? payload.exp * 1000 : undefined,
    source: mapping.source ?? "keycloak",
    raw: payload,
  };
}
