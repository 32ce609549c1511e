// packages/identity-core/src/index.ts

export * from "./claims";
export * from "./keycloak";
export * from "./revocation";
export * from "./verifier";
