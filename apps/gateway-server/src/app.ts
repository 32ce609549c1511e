import express, { type Express, type RequestHandler } from "express";
import compression from "compression";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { Redis } from "ioredis";

import { admissionGuard, requireRole } from "@gatehouse/admission";
import {
  auditLoggingMiddleware,
  createConsoleAuditSink,
  createLogger,
  describeError,
  healthRoutes,
  type AuditSink,
  type Logger,
} from "@gatehouse/audit";
import { RedisCacheStore } from "@gatehouse/cache";
import { createGatewayRouter, gatewayContext, gatewayErrorHandler } from "@gatehouse/gateway";
import {
  configFromEnv,
  createGatewayPipeline,
  describeConfig,
  GatewayError,
  type EnvLike,
  type GatewayComponentOverrides,
  type GatewayComponents,
  type GatewayConfig,
} from "@gatehouse/gateway-core";
import { identity, revokeRoutes } from "@gatehouse/identity";
import { RedisRevocationStore } from "@gatehouse/identity-core";
import { RedisCounterStore } from "@gatehouse/limiter";
import { securityHeaders } from "@gatehouse/transform";

export interface AppOverrides extends GatewayComponentOverrides {
  auditSink?: AuditSink;
}

export interface GatewayApp {
  app: Express;
  config: GatewayConfig;
  components: GatewayComponents;
  /** Stops the health monitor and disconnects from Redis. */
  close(): Promise<void>;
}

function connectRedis(url: string, logger: Logger): Redis {
  const redis = new Redis(url, { maxRetriesPerRequest: 1, enableOfflineQueue: false });
  redis.on("error", (err: unknown) => {
    logger.warn("redis connection error", { error: describeError(err) });
  });
  return redis;
}

export function buildApp(env: EnvLike = process.env, overrides: AppOverrides = {}): GatewayApp {
  // -----------------------------
  // Boot & configuration
  // -----------------------------
  const config = configFromEnv(env);
  const logger = overrides.logger ?? createLogger("gateway", { level: config.logLevel });
  logger.info("[boot] configuration loaded", describeConfig(config));

  // Shared stores when REDIS_URL is set; anything passed in wins.
  const redis = config.redisUrl ? connectRedis(config.redisUrl, logger.child("redis")) : undefined;
  const components = createGatewayPipeline(config, {
    ...overrides,
    logger,
    counterStore: overrides.counterStore ?? (redis ? new RedisCounterStore(redis) : undefined),
    cacheStore: overrides.cacheStore ?? (redis ? new RedisCacheStore(redis) : undefined),
    revocations:
      overrides.revocations ??
      (redis ? new RedisRevocationStore(redis, { clock: overrides.clock }) : undefined),
  });
  const { pipeline, verifier, revocations, health } = components;

  // Admin endpoints sit outside the pipeline, so they get their own limiter.
  const adminLimiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.limit,
    standardHeaders: "draft-7",
    legacyHeaders: false,
  });

  // -----------------------------
  // Core Express setup
  // -----------------------------
  const app = express();
  app.set("trust proxy", config.admission.trustProxy);
  app.disable("x-powered-by");

  app.use(gatewayContext());
  app.use(
    auditLoggingMiddleware(overrides.auditSink ?? createConsoleAuditSink(), {
      logger: logger.child("audit"),
    })
  );
  app.use(securityHeaders());
  app.use(admissionGuard(config.admission));
  app.use(
    cors({
      origin: config.admission.allowedOrigins.includes("*") ? true : config.admission.allowedOrigins,
      credentials: true,
    })
  );
  app.use(compression({ threshold: 1000 }));

  // -----------------------------
  // Operational endpoints
  // -----------------------------
  app.use(healthRoutes());

  const admin: RequestHandler[] = [
    adminLimiter,
    identity({ verify: verifier, logger }),
    requireRole("admin"),
  ];

  app.get("/health/breakers", ...admin, (_req, res) => {
    res.json({
      breakers: pipeline.breakers.snapshot(),
      instances: health ? health.status() : null,
    });
  });

  app.post("/admin/breakers/:service/reset", ...admin, (req, res, next) => {
    const { service } = req.params;
    if (!pipeline.breakers.has(service)) {
      next(new GatewayError("ROUTE_NOT_FOUND", `Unknown service ${service}`, 404));
      return;
    }
    pipeline.breakers.reset(service);
    logger.info("circuit reset by operator", { service, sub: req.user?.sub });
    res.json({ ok: true, service, state: pipeline.breakers.state(service) });
  });

  app.use(revokeRoutes({ verify: verifier, revocations, logger }));

  // -----------------------------
  // Everything else goes through the gateway pipeline
  // -----------------------------
  app.use(createGatewayRouter(pipeline, { logger }));
  app.use(gatewayErrorHandler({ logger }));

  return {
    app,
    config,
    components,
    async close() {
      health?.stop();
      if (redis) await redis.quit();
    },
  };
}
