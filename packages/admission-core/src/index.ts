// packages/admission-core/src/index.ts

export * from "./payload";
export * from "./roles";
export * from "./source";
