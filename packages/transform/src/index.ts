// packages/transform/src/index.ts

export * from "./headers";
export * from "./redact";
export * from "./security";
