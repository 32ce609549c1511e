// packages/transform/src/headers.ts

export const GATEWAY_VERSION = "1.0";

/** Connection-scoped headers that never cross a proxy hop. */
export const HOP_BY_HOP_HEADERS = [
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "proxy-connection",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
];

/** Client-supplied addressing headers that backends must not trust. */
export const UNTRUSTED_REQUEST_HEADERS = ["x-forwarded-for", "x-real-ip"];

export type IncomingHeaders = Record<string, string | string[] | undefined>;

/** Relayed response headers. `set-cookie` stays a list, one entry per cookie. */
export type ResponseHeaders = Record<string, string | string[]>;

export interface ScrubOptions {
  requestId: string;
  gatewayVersion?: string;
}

function connectionTokens(value: string | string[] | undefined): string[] {
  const raw = Array.isArray(value) ? value.join(",") : value ?? "";
  return raw
    .split(",")
    .map((t) => t.trim().toLowerCase())
    .filter(Boolean);
}

function flatten(value: string | string[]): string {
  return Array.isArray(value) ? value.join(", ") : value;
}

/**
 * Headers to send upstream. Drops hop-by-hop and untrusted addressing
 * headers, plus host and content-length which the HTTP client sets itself,
 * and stamps the gateway version and request id.
 */
export function scrubRequestHeaders(
  headers: IncomingHeaders,
  options: ScrubOptions
): Record<string, string> {
  const dropped = new Set([
    ...HOP_BY_HOP_HEADERS,
    ...UNTRUSTED_REQUEST_HEADERS,
    ...connectionTokens(headers.connection),
    "host",
    "content-length",
    "x-gateway-version",
    "x-request-id",
  ]);

  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (value === undefined || dropped.has(lower)) continue;
    out[lower] = flatten(value);
  }

  out["x-gateway-version"] = options.gatewayVersion ?? GATEWAY_VERSION;
  out["x-request-id"] = options.requestId;
  return out;
}

/**
 * Backend response headers worth relaying. Framing headers are dropped
 * because the body is re-sent in full and already decoded.
 */
export function filterResponseHeaders(headers: Iterable<[string, string]>): ResponseHeaders {
  const dropped = new Set([...HOP_BY_HOP_HEADERS, "content-length", "content-encoding"]);
  const out: ResponseHeaders = {};
  const cookies: string[] = [];
  for (const [name, value] of headers) {
    const lower = name.toLowerCase();
    if (dropped.has(lower)) continue;
    // Cookie attributes contain commas, so cookies are never joined.
    if (lower === "set-cookie") {
      cookies.push(value);
      continue;
    }
    const existing = out[lower];
    out[lower] = existing === undefined ? value : `${existing}, ${value}`;
  }
  if (cookies.length > 0) out["set-cookie"] = cookies;
  return out;
}

/** A relayed header as one string; lists are comma-joined. */
export function headerText(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value.join(", ") : value;
}
