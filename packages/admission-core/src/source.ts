// packages/admission-core/src/source.ts

const WILDCARDS = new Set(["*", "0.0.0.0"]);

export interface SourcePolicy {
  /** Allowed client IPs. "*" or "0.0.0.0" admits any address. */
  allowedIps: string[];
  /** Allowed Origin header values. "*" admits any origin. */
  allowedOrigins: string[];
}

export interface SourceInput {
  ip?: string;
  origin?: string;
}

export type AdmissionDecision = { ok: true } | { ok: false; reason: string };

/**
 * Canonical form of a socket address: trimmed, lower-case, without the
 * IPv4-mapped IPv6 prefix.
 */
export function normalizeIp(ip: string): string {
  const trimmed = ip.trim().toLowerCase();
  return trimmed.startsWith("::ffff:") && trimmed.includes(".")
    ? trimmed.slice("::ffff:".length)
    : trimmed;
}

export function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/+$/, "").toLowerCase();
}

/**
 * `user:<sub>` for authenticated callers, `ip:<address>` otherwise.
 */
export function clientIdentity(sub: string | undefined, ip: string | undefined): string {
  if (sub) return `user:${sub}`;
  return `ip:${ip ? normalizeIp(ip) : "unknown"}`;
}

export function isIpAllowed(policy: Pick<SourcePolicy, "allowedIps">, ip: string | undefined): boolean {
  if (policy.allowedIps.some((entry) => WILDCARDS.has(entry))) return true;
  if (!ip) return false;
  const normalized = normalizeIp(ip);
  return policy.allowedIps.some((entry) => normalizeIp(entry) === normalized);
}

export function isOriginAllowed(
  policy: Pick<SourcePolicy, "allowedOrigins">,
  origin: string | undefined
): boolean {
  // Non-browser callers send no Origin.
  if (origin === undefined) return true;
  if (policy.allowedOrigins.includes("*")) return true;
  const normalized = normalizeOrigin(origin);
  return policy.allowedOrigins.some((entry) => normalizeOrigin(entry) === normalized);
}

export function checkSource(policy: SourcePolicy, input: SourceInput): AdmissionDecision {
  if (!isIpAllowed(policy, input.ip)) {
    return { ok: false, reason: `source address ${input.ip ?? "unknown"} is not allowed` };
  }
  if (!isOriginAllowed(policy, input.origin)) {
    return { ok: false, reason: `origin ${input.origin} is not allowed` };
  }
  return { ok: true };
}
