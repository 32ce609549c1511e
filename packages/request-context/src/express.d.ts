// packages/request-context/src/express.d.ts

import type { GatewayContext, GatewayIdentity } from "./types";

declare module "express-serve-static-core" {
  interface Request {
    /**
     * Shared gateway context for this HTTP request.
     * Created by the first gateway middleware, enriched by every layer after it.
     */
    gateway?: GatewayContext;

    /** Verified caller, set by the bearer-auth middleware. */
    user?: GatewayIdentity;
  }
}
