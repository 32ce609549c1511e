// packages/breaker/src/index.ts
export * from "./registry";
