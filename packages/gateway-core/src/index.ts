// packages/gateway-core/src/index.ts

export * from "./config";
export * from "./errors";
export * from "./factory";
export * from "./forwarder";
export * from "./health-monitor";
export * from "./pipeline";
export * from "./routes";
export * from "./selector";
