import { describe, it, expect } from "vitest";
import express, { type ErrorRequestHandler, type RequestHandler } from "express";
import request from "supertest";

import { renderGatewayError } from "@gatehouse/gateway-core";
import type { GatewayIdentity } from "@gatehouse/request-context";

import { admissionGuard, requireRole } from "../src/index";

const renderErrors: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const rendered = renderGatewayError(err);
  res.status(rendered.status).json(rendered.body);
};

function asUser(roles: string[]): RequestHandler {
  const user: GatewayIdentity = {
    sub: "carol",
    issuer: "http://idp.test",
    roles,
    scopes: [],
    tier: "standard",
    source: "keycloak",
    raw: {},
  };
  return (req, _res, next) => {
    req.user = user;
    next();
  };
}

describe("admissionGuard", () => {
  function guarded(options: Parameters<typeof admissionGuard>[0]) {
    const app = express();
    app.use(admissionGuard(options));
    app.post("/upload", (_req, res) => {
      res.json({ ok: true });
    });
    app.use(renderErrors);
    return app;
  }

  it("admits allowed sources within the size limit", async () => {
    const app = guarded({ allowedIps: ["*"], allowedOrigins: ["http://app.test"], maxPayloadBytes: 64 });
    const res = await request(app).post("/upload").set("Origin", "http://app.test").send("small");
    expect(res.status).toBe(200);
  });

  it("refuses an unlisted origin", async () => {
    const app = guarded({ allowedIps: ["*"], allowedOrigins: ["http://app.test"], maxPayloadBytes: 64 });
    const res = await request(app).post("/upload").set("Origin", "http://evil.test");
    expect(res.status).toBe(403);
    expect(res.body.error).toEqual({
      code: "FORBIDDEN",
      message: "origin http://evil.test is not allowed",
    });
  });

  it("refuses an unlisted address", async () => {
    const app = guarded({ allowedIps: ["10.0.0.1"], allowedOrigins: ["*"], maxPayloadBytes: 64 });
    const res = await request(app).post("/upload");
    expect(res.status).toBe(403);
    expect(res.body.error.message).toMatch(/^source address .* is not allowed$/);
  });

  it("refuses a declared body over the limit", async () => {
    const app = guarded({ allowedIps: ["*"], allowedOrigins: ["*"], maxPayloadBytes: 4 });
    const res = await request(app).post("/upload").send("too long");
    expect(res.status).toBe(413);
    expect(res.body.error).toEqual({
      code: "PAYLOAD_TOO_LARGE",
      message: "declared payload of 8 bytes exceeds 4",
    });
  });
});

describe("requireRole", () => {
  function protectedApp(pre: RequestHandler[]) {
    const app = express();
    app.get("/admin", ...pre, requireRole("admin"), (_req, res) => {
      res.json({ ok: true });
    });
    app.use(renderErrors);
    return app;
  }

  it("lets a caller with the role through", async () => {
    await request(protectedApp([asUser(["user", "admin"])])).get("/admin").expect(200);
  });

  it("returns 403 with the required roles otherwise", async () => {
    const res = await request(protectedApp([asUser(["user"])])).get("/admin");
    expect(res.status).toBe(403);
    expect(res.body.error).toEqual({
      code: "FORBIDDEN",
      message: "Insufficient permissions",
      details: { required: ["admin"] },
    });
  });

  it("returns 401 without an authenticated caller", async () => {
    const res = await request(protectedApp([])).get("/admin");
    expect(res.status).toBe(401);
    expect(res.body.error.code).toBe("UNAUTHORIZED");
  });
});
