// packages/gateway-core/src/forwarder.ts

import type { QueryInput } from "@gatehouse/cache";
import { filterResponseHeaders, type ResponseHeaders } from "@gatehouse/transform";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface UpstreamRequest {
  /** Instance base URL, without trailing slash. */
  baseUrl: string;
  method: string;
  path: string;
  query?: QueryInput;
  headers: Record<string, string>;
  body?: Buffer;
  timeoutMs: number;
}

export interface UpstreamResponse {
  status: number;
  headers: ResponseHeaders;
  body: Buffer;
}

export type UpstreamResult =
  | { kind: "response"; response: UpstreamResponse; latencyMs: number }
  | { kind: "timeout"; latencyMs: number }
  | { kind: "network"; error: unknown; latencyMs: number };

const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

export function buildUpstreamUrl(baseUrl: string, path: string, query: QueryInput = {}): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    for (const v of Array.isArray(value) ? value : [value]) params.append(key, v);
  }
  const qs = params.toString();
  return `${baseUrl}${path}${qs ? `?${qs}` : ""}`;
}

/**
 * One upstream call, bounded by `timeoutMs` from request start until the
 * body has been read. Never throws.
 */
export async function forwardRequest(
  fetchImpl: FetchLike,
  req: UpstreamRequest
): Promise<UpstreamResult> {
  const started = performance.now();
  const elapsed = () => Math.round(performance.now() - started);

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, req.timeoutMs);

  const method = req.method.toUpperCase();
  const sendBody = !BODYLESS_METHODS.has(method) && req.body !== undefined && req.body.length > 0;

  try {
    const res = await fetchImpl(buildUpstreamUrl(req.baseUrl, req.path, req.query), {
      method,
      headers: req.headers,
      body: sendBody && req.body ? new Uint8Array(req.body).buffer : undefined,
      redirect: "manual",
      signal: controller.signal,
    });
    const body = Buffer.from(await res.arrayBuffer());
    const headers = filterResponseHeaders(res.headers);
    const cookies = res.headers.getSetCookie();
    if (cookies.length > 0) headers["set-cookie"] = cookies;
    return {
      kind: "response",
      response: { status: res.status, headers, body },
      latencyMs: elapsed(),
    };
  } catch (error: unknown) {
    if (timedOut) return { kind: "timeout", latencyMs: elapsed() };
    return { kind: "network", error, latencyMs: elapsed() };
  } finally {
    clearTimeout(timer);
  }
}
