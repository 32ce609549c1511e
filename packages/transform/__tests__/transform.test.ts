import { describe, it, expect } from "vitest";
import express from "express";
import request from "supertest";

import {
  SECURITY_HEADERS,
  filterResponseHeaders,
  isJsonContentType,
  redactSensitiveFields,
  sanitizeJsonBody,
  scrubRequestHeaders,
  securityHeaders,
} from "../src/index";

describe("scrubRequestHeaders", () => {
  it("drops addressing and hop-by-hop headers and stamps gateway headers", () => {
    const out = scrubRequestHeaders(
      {
        host: "gateway.local",
        "X-Forwarded-For": "10.0.0.1",
        "x-real-ip": "10.0.0.2",
        connection: "keep-alive, x-trace-hop",
        "x-trace-hop": "1",
        "content-length": "12",
        "x-request-id": "spoofed",
        authorization: "Bearer test-token",
        accept: ["application/json", "text/plain"],
        "x-missing": undefined,
      },
      { requestId: "gw_1" }
    );

    expect(out).toEqual({
      authorization: "Bearer test-token",
      accept: "application/json, text/plain",
      "x-gateway-version": "1.0",
      "x-request-id": "gw_1",
    });
  });

  it("takes a custom gateway version", () => {
    const out = scrubRequestHeaders({}, { requestId: "r", gatewayVersion: "2.3" });
    expect(out["x-gateway-version"]).toBe("2.3");
  });
});

describe("filterResponseHeaders", () => {
  it("drops framing headers and merges repeats", () => {
    expect(
      filterResponseHeaders([
        ["Content-Type", "application/json"],
        ["Content-Length", "10"],
        ["Content-Encoding", "gzip"],
        ["Transfer-Encoding", "chunked"],
        ["Vary", "Accept"],
        ["vary", "Origin"],
      ])
    ).toEqual({ "content-type": "application/json", vary: "Accept, Origin" });
  });

  it("keeps cookies as a list", () => {
    expect(
      filterResponseHeaders([
        ["Set-Cookie", "a=1; Expires=Wed, 21 Oct 2026 07:28:00 GMT"],
        ["set-cookie", "b=2"],
      ])
    ).toEqual({ "set-cookie": ["a=1; Expires=Wed, 21 Oct 2026 07:28:00 GMT", "b=2"] });
  });
});

describe("redaction", () => {
  it("removes sensitive keys at any depth, case-insensitively", () => {
    const input = {
      id: 1,
      Password: "hunter2",
      profile: { api_key: "test-key", name: "n" },
      sessions: [{ session_id: "s", device: "d" }],
    };
    expect(redactSensitiveFields(input)).toEqual({
      id: 1,
      profile: { name: "n" },
      sessions: [{ device: "d" }],
    });
    expect(input.Password).toBe("hunter2");
  });

  it("accepts a custom field list", () => {
    expect(redactSensitiveFields({ ssn: "x", a: 1 }, ["SSN"])).toEqual({ a: 1 });
  });

  it("recognizes JSON content types", () => {
    expect(isJsonContentType("application/json; charset=utf-8")).toBe(true);
    expect(isJsonContentType("application/problem+json")).toBe(true);
    expect(isJsonContentType("text/html")).toBe(false);
    expect(isJsonContentType(undefined)).toBe(false);
  });

  it("rewrites JSON bodies only", () => {
    const json = Buffer.from('{"a":1,"password":"p"}');
    expect(sanitizeJsonBody(json, "application/json").toString()).toBe('{"a":1}');

    const text = Buffer.from('{"password":"p"}');
    expect(sanitizeJsonBody(text, "text/plain")).toBe(text);

    const broken = Buffer.from("{not json");
    expect(sanitizeJsonBody(broken, "application/json")).toBe(broken);
  });
});

describe("securityHeaders middleware", () => {
  it("sets every security header", async () => {
    const app = express();
    app.use(securityHeaders());
    app.get("/x", (_req, res) => {
      res.json({ ok: true });
    });

    const res = await request(app).get("/x");
    expect(res.status).toBe(200);
    for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
      expect(res.headers[name.toLowerCase()]).toBe(value);
    }
  });
});
