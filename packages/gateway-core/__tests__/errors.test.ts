import { describe, it, expect } from "vitest";

import {
  BackendError,
  BackendTimeoutError,
  ForbiddenError,
  GatewayError,
  NoHealthyBackendError,
  PayloadTooLargeError,
  RouteNotFoundError,
  ServiceUnavailableError,
  TooManyRequestsError,
  UnauthorizedError,
  renderGatewayError,
  toGatewayError,
} from "../src/index";

describe("gateway errors", () => {
  it("carry their code and status", () => {
    const cases: Array<[GatewayError, string, number]> = [
      [new ForbiddenError(), "FORBIDDEN", 403],
      [new PayloadTooLargeError(), "PAYLOAD_TOO_LARGE", 413],
      [new UnauthorizedError(), "UNAUTHORIZED", 401],
      [new TooManyRequestsError(1500), "TOO_MANY_REQUESTS", 429],
      [new RouteNotFoundError("/x"), "ROUTE_NOT_FOUND", 404],
      [new ServiceUnavailableError("orders"), "SERVICE_UNAVAILABLE", 503],
      [new NoHealthyBackendError("orders"), "NO_HEALTHY_BACKEND", 503],
      [new BackendTimeoutError("orders", 100), "BACKEND_TIMEOUT", 504],
      [new BackendError("orders", "boom"), "BACKEND_ERROR", 502],
    ];
    for (const [err, code, status] of cases) {
      expect(err).toBeInstanceOf(GatewayError);
      expect(err.code).toBe(code);
      expect(err.status).toBe(status);
    }
  });

  it("wraps unknown errors as GATEWAY_ERROR", () => {
    const cause = new TypeError("x is undefined");
    const err = toGatewayError(cause);
    expect(err.code).toBe("GATEWAY_ERROR");
    expect(err.status).toBe(500);
    expect(err.cause).toBe(cause);
  });

  it("renders 401 with a challenge", () => {
    expect(renderGatewayError(new UnauthorizedError("Missing bearer token"), "gw_1")).toEqual({
      status: 401,
      headers: { "WWW-Authenticate": 'Bearer error="invalid_token"' },
      body: {
        ok: false,
        error: { code: "UNAUTHORIZED", message: "Missing bearer token" },
        requestId: "gw_1",
      },
    });
  });

  it("renders 429 with Retry-After rounded up to whole seconds", () => {
    const rendered = renderGatewayError(new TooManyRequestsError(1500, { limit: 100 }));
    expect(rendered.status).toBe(429);
    expect(rendered.headers).toEqual({ "Retry-After": "2" });
    expect(rendered.body.error.details).toEqual({ limit: 100, retryAfterMs: 1500 });
  });

  it("never renders a Retry-After below one second", () => {
    expect(new TooManyRequestsError(0).headers()).toEqual({ "Retry-After": "1" });
  });

  it("hides internal messages", () => {
    const rendered = renderGatewayError(new Error("db password wrong"));
    expect(rendered.body.error).toEqual({ code: "GATEWAY_ERROR", message: "Internal gateway error" });
  });
});
