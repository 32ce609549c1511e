// packages/identity-core/src/revocation.ts

import { createHash } from "node:crypto";

import { systemClock, type Clock } from "@gatehouse/clock";

/** How long a revocation is kept when the token carries no exp. */
export const DEFAULT_REVOCATION_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Revoked access tokens. Entries only need to outlive the token itself.
 */
export interface RevocationStore {
  revoke(token: string, expiresAt?: number): Promise<void>;
  isRevoked(token: string): Promise<boolean>;
}

/**
 * Tokens are stored by digest so a dump of the store cannot be replayed.
 */
export function tokenDigest(token: string): string {
  return createHash("sha256").update(token).digest("hex");
}

export class MemoryRevocationStore implements RevocationStore {
  private readonly revoked = new Map<string, number>();
  private readonly clock: Clock;

  constructor(options: { clock?: Clock } = {}) {
    this.clock = options.clock ?? systemClock;
  }

  async revoke(token: string, expiresAt?: number): Promise<void> {
    const until = expiresAt ?? this.clock.now() + DEFAULT_REVOCATION_TTL_MS;
    this.revoked.set(tokenDigest(token), until);
  }

  async isRevoked(token: string): Promise<boolean> {
    const key = tokenDigest(token);
    const until = this.revoked.get(key);
    if (until === undefined) return false;
    if (until <= this.clock.now()) {
      this.revoked.delete(key);
      return false;
    }
    return true;
  }
}

/**
 * The slice of an ioredis client the Redis revocation store uses.
 */
export interface RedisRevocationClient {
  set(key: string, value: string, millisecondsToken: "PX", milliseconds: number): Promise<unknown>;
  exists(...keys: string[]): Promise<number>;
}

export class RedisRevocationStore implements RevocationStore {
  private readonly keyPrefix: string;
  private readonly clock: Clock;

  constructor(
    private readonly redis: RedisRevocationClient,
    options: { keyPrefix?: string; clock?: Clock } = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? "gatehouse:revoked:";
    this.clock = options.clock ?? systemClock;
  }

  async revoke(token: string, expiresAt?: number): Promise<void> {
    const ttlMs =
      expiresAt === undefined
        ? DEFAULT_REVOCATION_TTL_MS
        : Math.ceil(expiresAt - this.clock.now());
    // Already expired: the verifier rejects it anyway.
    if (ttlMs <= 0) return;
    await this.redis.set(this.keyPrefix + tokenDigest(token), "1", "PX", ttlMs);
  }

  async isRevoked(token: string): Promise<boolean> {
    return (await this.redis.exists(this.keyPrefix + tokenDigest(token))) > 0;
  }
}
