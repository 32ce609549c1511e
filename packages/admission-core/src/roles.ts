// packages/admission-core/src/roles.ts

import type { AdmissionDecision } from "./source";

export const PRIVILEGED_ROLES = ["admin"];

/**
 * True when no roles are required or the caller holds at least one.
 */
export function hasAnyRole(roles: readonly string[], required: readonly string[]): boolean {
  if (required.length === 0) return true;
  return required.some((role) => roles.includes(role));
}

export function pathSegments(path: string): string[] {
  return path.split("?")[0].split("/").filter(Boolean);
}

export interface OwnershipInput {
  path: string;
  sub: string;
  roles: readonly string[];
  /** Index of the owner id among the path's segments. */
  ownerSegment: number;
  /** Roles that may act on any owner's resources. */
  privilegedRoles?: readonly string[];
}

/**
 * The owner segment, when the path has one, must equal the caller's subject.
 */
export function checkOwnership(input: OwnershipInput): AdmissionDecision {
  const owner = pathSegments(input.path)[input.ownerSegment];
  if (owner === undefined) return { ok: true };

  const privileged = input.privilegedRoles ?? PRIVILEGED_ROLES;
  if (privileged.length > 0 && hasAnyRole(input.roles, privileged)) return { ok: true };

  let decoded: string;
  try {
    decoded = decodeURIComponent(owner);
  } catch {
    return { ok: false, reason: "malformed resource owner in path" };
  }
  return decoded === input.sub
    ? { ok: true }
    : { ok: false, reason: "resource ownership check failed" };
}
