import { describe, it, expect } from "vitest";
import express, { type ErrorRequestHandler } from "express";
import request from "supertest";

import { renderGatewayError } from "@gatehouse/gateway-core";
import { MemoryRevocationStore, type TokenVerifier } from "@gatehouse/identity-core";
import type { GatewayIdentity } from "@gatehouse/request-context";

import { identity, revokeRoutes } from "../src/index";

const bob: GatewayIdentity = {
  sub: "bob",
  issuer: "http://idp.test",
  roles: ["user"],
  scopes: [],
  tier: "standard",
  expiresAt: Date.now() + 3_600_000,
  source: "keycloak",
  raw: { sub: "bob" },
};

const renderErrors: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const rendered = renderGatewayError(err);
  res.status(rendered.status).set(rendered.headers).json(rendered.body);
};

function stubVerifier(revocations: MemoryRevocationStore): TokenVerifier {
  return async (token) => {
    if (token === "explode") throw new Error("jwks fetch failed");
    if (await revocations.isRevoked(token)) return { ok: false, error: "token_revoked" };
    return token === "bob-token"
      ? { ok: true, identity: bob, payload: { sub: "bob" } }
      : { ok: false, error: "invalid_token" };
  };
}

function makeApp() {
  const revocations = new MemoryRevocationStore();
  const verify = stubVerifier(revocations);
  const app = express();
  app.use(revokeRoutes({ verify, revocations }));
  app.get("/me", identity({ verify }), (req, res) => {
    res.json({ sub: req.user?.sub });
  });
  app.use(renderErrors);
  return { app, revocations };
}

describe("identity middleware", () => {
  it("attaches the verified caller", async () => {
    const { app } = makeApp();
    const res = await request(app).get("/me").set("Authorization", "Bearer bob-token");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ sub: "bob" });
  });

  it("rejects a missing token with a realm challenge", async () => {
    const { app } = makeApp();
    const res = await request(app).get("/me");
    expect(res.status).toBe(401);
    expect(res.headers["www-authenticate"]).toBe('Bearer realm="gateway"');
    expect(res.body.error).toEqual({ code: "UNAUTHORIZED", message: "Missing bearer token" });
  });

  it("rejects an invalid token", async () => {
    const { app } = makeApp();
    const res = await request(app).get("/me").set("Authorization", "Bearer nope");
    expect(res.status).toBe(401);
    expect(res.headers["www-authenticate"]).toBe('Bearer error="invalid_token"');
    expect(res.body.error.message).toBe("Invalid or expired token");
  });

  it("fails closed when verification throws", async () => {
    const { app } = makeApp();
    const res = await request(app).get("/me").set("Authorization", "Bearer explode");
    expect(res.status).toBe(401);
    expect(res.body.error.message).toBe("Token could not be verified");
  });
});

describe("revokeRoutes", () => {
  it("revokes the presented token", async () => {
    const { app, revocations } = makeApp();

    const revoked = await request(app).post("/auth/revoke").set("Authorization", "Bearer bob-token");
    expect(revoked.status).toBe(200);
    expect(revoked.body).toEqual({ ok: true, revoked: true });
    expect(await revocations.isRevoked("bob-token")).toBe(true);

    const after = await request(app).get("/me").set("Authorization", "Bearer bob-token");
    expect(after.status).toBe(401);
    expect(after.body.error.message).toBe("Token has been revoked");
  });

  it("requires a valid token to revoke", async () => {
    const { app } = makeApp();
    const res = await request(app).post("/auth/revoke");
    expect(res.status).toBe(401);
  });
});
