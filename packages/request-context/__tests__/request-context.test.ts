import { describe, it, expect } from "vitest";

import {
  bindGatewayContext,
  createGatewayContext,
  getGatewayContext,
  mergeGatewayContext,
  runWithGatewayContext,
  updateGatewayContext,
} from "../src/index";

describe("createGatewayContext", () => {
  it("fills request defaults and keeps overrides", () => {
    const ctx = createGatewayContext({
      request: { method: "GET", path: "/api/order/1", ip: "10.0.0.1" },
    });

    expect(ctx.request.method).toBe("GET");
    expect(ctx.request.path).toBe("/api/order/1");
    expect(ctx.request.ip).toBe("10.0.0.1");
    expect(ctx.request.requestId.startsWith("gw_")).toBe(true);
    expect(ctx.extras).toEqual({});
  });

  it("uses an explicit requestId when given", () => {
    const ctx = createGatewayContext({ request: { requestId: "req_1" } });
    expect(ctx.request.requestId).toBe("req_1");
    expect(ctx.request.method).toBe("UNKNOWN");
  });
});

describe("mergeGatewayContext", () => {
  it("merges nested sections instead of replacing them", () => {
    const base = createGatewayContext({
      request: { requestId: "req_1" },
      routing: { service: "order-service" },
    });

    const merged = mergeGatewayContext(base, {
      routing: { instance: "http://orders-1" },
      cache: { status: "miss" },
    });

    expect(merged.routing).toEqual({
      service: "order-service",
      instance: "http://orders-1",
    });
    expect(merged.cache).toEqual({ status: "miss" });
    expect(merged.request.requestId).toBe("req_1");
  });
});

describe("async context", () => {
  it("exposes the context across awaits and mutates it in place", async () => {
    await runWithGatewayContext({ request: { requestId: "req_als" } }, async () => {
      const before = getGatewayContext();
      await Promise.resolve();
      updateGatewayContext({ limits: { decision: "ok", key: "user:u1" } });

      const after = getGatewayContext();
      expect(after).toBe(before);
      expect(after?.limits).toEqual({ decision: "ok", key: "user:u1" });
    });
  });

  it("is a no-op outside a context", () => {
    expect(getGatewayContext()).toBeUndefined();
    expect(() => updateGatewayContext({ cache: { status: "hit" } })).not.toThrow();
  });

  it("binds an existing context", async () => {
    const ctx = createGatewayContext({ request: { requestId: "req_bound" } });
    await bindGatewayContext(ctx, async () => {
      await Promise.resolve();
      updateGatewayContext({ cache: { status: "bypass" } });
    });
    expect(ctx.cache).toEqual({ status: "bypass" });
  });
});
