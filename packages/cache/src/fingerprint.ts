// packages/cache/src/fingerprint.ts

import { createHash } from "node:crypto";

export type QueryInput = Record<string, string | string[] | undefined>;
export type HeaderInput = Record<string, string | string[] | undefined>;

export interface FingerprintInput {
  method: string;
  path: string;
  query?: QueryInput;
  headers?: HeaderInput;
  /** Request headers whose values split the cache. Matched case-insensitively. */
  varyHeaders?: string[];
  /**
   * Who the response was computed for ("user:<sub>", "public").
   * Keeps one caller's view from being served to another.
   */
  scope?: string;
}

function asList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Stable query string: keys sorted, repeated values kept in request order.
 */
export function normalizeQuery(query: QueryInput = {}): string {
  return Object.keys(query)
    .sort()
    .flatMap((key) =>
      asList(query[key]).map((v) => `${encodeURIComponent(key)}=${encodeURIComponent(v)}`)
    )
    .join("&");
}

function headerValue(headers: HeaderInput, name: string): string {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return asList(value).join(", ");
  }
  return "";
}

/**
 * Deterministic cache key for a request: `cache:<sha256 hex>`.
 */
export function fingerprint(input: FingerprintInput): string {
  const headers = input.headers ?? {};
  const vary = [...(input.varyHeaders ?? [])]
    .map((h) => h.toLowerCase())
    .sort()
    .map((h) => `${h}:${headerValue(headers, h)}`)
    .join("\n");

  const material = [
    input.method.toUpperCase(),
    input.path,
    normalizeQuery(input.query),
    vary,
    input.scope ?? "public",
  ].join("\n--\n");

  return `cache:${createHash("sha256").update(material).digest("hex")}`;
}

const CACHEABLE_METHODS = new Set(["GET", "HEAD"]);

/**
 * Only reads on routes that opted into caching produce entries.
 */
export function isCacheableRequest(method: string, routeCacheable: boolean): boolean {
  return routeCacheable && CACHEABLE_METHODS.has(method.toUpperCase());
}

/**
 * Only plain 200s that are not marked private and set no cookies are stored.
 */
export function isCacheableResponse(
  status: number,
  headers: Record<string, string | string[]> = {}
): boolean {
  if (status !== 200) return false;
  if (headers["set-cookie"] !== undefined) return false;
  const raw = headers["cache-control"] ?? "";
  const cc = (Array.isArray(raw) ? raw.join(", ") : raw).toLowerCase();
  return !/\b(no-store|private)\b/.test(cc);
}
