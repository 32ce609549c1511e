// packages/identity/src/index.ts

export { identity, type BearerAuthOptions } from "./bearer";
export { revokeRoutes, type RevokeRoutesOptions } from "./revoke";
