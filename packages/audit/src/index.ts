// packages/audit/src/index.ts

export * from "./logger";
export * from "./events";
export { healthRoutes, type HealthRoutesOptions } from "./health";
