// packages/cache/src/index.ts
export * from "./types";
export * from "./stores";
export * from "./fingerprint";
export * from "./response-cache";
