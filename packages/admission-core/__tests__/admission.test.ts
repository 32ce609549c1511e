import { describe, it, expect } from "vitest";

import {
  checkOwnership,
  checkPayloadSize,
  checkSource,
  clientIdentity,
  hasAnyRole,
  isIpAllowed,
  isOriginAllowed,
  normalizeIp,
  parseContentLength,
  pathSegments,
} from "../src/index";

describe("source checks", () => {
  const policy = {
    allowedIps: ["127.0.0.1", "::1"],
    allowedOrigins: ["http://localhost:3000"],
  };

  it("normalizes IPv4-mapped addresses", () => {
    expect(normalizeIp("::ffff:127.0.0.1")).toBe("127.0.0.1");
    expect(normalizeIp(" ::1 ")).toBe("::1");
    expect(normalizeIp("::FFFF:abcd")).toBe("::ffff:abcd");
  });

  it("admits listed addresses, mapped or not", () => {
    expect(isIpAllowed(policy, "127.0.0.1")).toBe(true);
    expect(isIpAllowed(policy, "::ffff:127.0.0.1")).toBe(true);
    expect(isIpAllowed(policy, "10.0.0.5")).toBe(false);
    expect(isIpAllowed(policy, undefined)).toBe(false);
  });

  it("treats 0.0.0.0 and * as allow-any", () => {
    expect(isIpAllowed({ allowedIps: ["0.0.0.0"] }, "203.0.113.9")).toBe(true);
    expect(isIpAllowed({ allowedIps: ["*"] }, undefined)).toBe(true);
  });

  it("checks Origin only when present", () => {
    expect(isOriginAllowed(policy, undefined)).toBe(true);
    expect(isOriginAllowed(policy, "http://localhost:3000/")).toBe(true);
    expect(isOriginAllowed(policy, "http://evil.test")).toBe(false);
    expect(isOriginAllowed({ allowedOrigins: ["*"] }, "http://any.test")).toBe(true);
  });

  it("reports the first failing rule", () => {
    expect(checkSource(policy, { ip: "10.0.0.5" })).toEqual({
      ok: false,
      reason: "source address 10.0.0.5 is not allowed",
    });
    expect(checkSource(policy, { ip: "127.0.0.1", origin: "http://evil.test" })).toEqual({
      ok: false,
      reason: "origin http://evil.test is not allowed",
    });
    expect(checkSource(policy, { ip: "::1", origin: "http://localhost:3000" })).toEqual({ ok: true });
  });

  it("derives the client identity", () => {
    expect(clientIdentity("u-1", "127.0.0.1")).toBe("user:u-1");
    expect(clientIdentity(undefined, "::ffff:10.1.2.3")).toBe("ip:10.1.2.3");
    expect(clientIdentity(undefined, undefined)).toBe("ip:unknown");
  });
});

describe("payload size", () => {
  it("parses only plain integers", () => {
    expect(parseContentLength("42")).toBe(42);
    expect(parseContentLength("-1")).toBeUndefined();
    expect(parseContentLength("12abc")).toBeUndefined();
    expect(parseContentLength(undefined)).toBeUndefined();
  });

  it("accepts a payload exactly at the limit", () => {
    expect(checkPayloadSize(100, { declared: 100, actual: 100 })).toEqual({ ok: true });
  });

  it("rejects an oversized declaration before the body is read", () => {
    expect(checkPayloadSize(100, { declared: 101 })).toEqual({
      ok: false,
      reason: "declared payload of 101 bytes exceeds 100",
    });
  });

  it("rejects an oversized body whatever was declared", () => {
    expect(checkPayloadSize(100, { declared: 10, actual: 150 })).toEqual({
      ok: false,
      reason: "payload of 150 bytes exceeds 100",
    });
  });
});

describe("roles and ownership", () => {
  it("requires at least one matching role", () => {
    expect(hasAnyRole(["user"], [])).toBe(true);
    expect(hasAnyRole(["user"], ["user", "admin"])).toBe(true);
    expect(hasAnyRole(["user"], ["admin"])).toBe(false);
  });

  it("splits paths into segments", () => {
    expect(pathSegments("/api/user/u-1/orders?x=1")).toEqual(["api", "user", "u-1", "orders"]);
  });

  it("lets callers reach only their own resources", () => {
    const base = { sub: "u-1", roles: ["user"], ownerSegment: 2 };
    expect(checkOwnership({ ...base, path: "/api/user/u-1/profile" })).toEqual({ ok: true });
    expect(checkOwnership({ ...base, path: "/api/user/u-2" })).toEqual({
      ok: false,
      reason: "resource ownership check failed",
    });
    expect(checkOwnership({ ...base, path: "/api/user" })).toEqual({ ok: true });
  });

  it("decodes the owner segment", () => {
    expect(
      checkOwnership({ sub: "a b", roles: [], ownerSegment: 2, path: "/api/user/a%20b" })
    ).toEqual({ ok: true });
    expect(
      checkOwnership({ sub: "x", roles: [], ownerSegment: 2, path: "/api/user/%E0%A4%A" })
    ).toEqual({ ok: false, reason: "malformed resource owner in path" });
  });

  it("lets privileged roles through", () => {
    expect(
      checkOwnership({ sub: "u-1", roles: ["admin"], ownerSegment: 2, path: "/api/user/u-2" })
    ).toEqual({ ok: true });
    expect(
      checkOwnership({
        sub: "u-1",
        roles: ["admin"],
        ownerSegment: 2,
        path: "/api/user/u-2",
        privilegedRoles: [],
      })
    ).toEqual({ ok: false, reason: "resource ownership check failed" });
  });
});
