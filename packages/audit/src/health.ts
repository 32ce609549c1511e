// packages/audit/src/health.ts

import { Router } from "express";

export interface HealthRoutesOptions {
  /** Reported in the body; defaults to "gateway-server". */
  serviceName?: string;
}

/**
 * Public liveness endpoint. Deliberately cheap: it never touches backends,
 * Redis or the identity provider.
 */
export function healthRoutes(options: HealthRoutesOptions = {}): Router {
  const r = Router();
  const service = options.serviceName ?? "gateway-server";

  r.get("/health", (_req, res) => {
    res.status(200).json({
      status: "healthy",
      service,
      timestamp: new Date().toISOString(),
    });
  });

  return r;
}
