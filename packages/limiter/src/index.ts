// packages/limiter/src/index.ts
export * from "./stores";
export * from "./limiter";
