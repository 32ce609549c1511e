// packages/gateway/src/index.ts

export { gatewayContext } from "./context";
export { gatewayErrorHandler } from "./errors";
export { createGatewayRouter, type GatewayRouterOptions } from "./router";
