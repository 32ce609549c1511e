import { createLogger, describeError } from "@gatehouse/audit";
import { GatewayConfigError } from "@gatehouse/gateway-core";

import { buildApp, type GatewayApp } from "./app";

const logger = createLogger("gateway-server");

let gateway: GatewayApp;
try {
  gateway = buildApp(process.env);
} catch (err: unknown) {
  if (err instanceof GatewayConfigError) {
    for (const issue of err.issues) logger.error("[boot] bad configuration", { issue });
  } else {
    logger.error("[boot] failed to start", { error: describeError(err) });
  }
  process.exit(1);
}

const { app, config, components, close } = gateway;
components.health?.start();

const server = app.listen(config.port, () => {
  logger.info("listening", { port: config.port });
});

function shutdown(signal: string): void {
  logger.info("shutting down", { signal });
  server.close((err) => {
    if (err) logger.error("server close failed", { error: describeError(err) });
  });
  close().catch((err: unknown) => {
    logger.error("cleanup failed", { error: describeError(err) });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
