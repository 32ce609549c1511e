// packages/cache/src/response-cache.ts

import { describeError, silentLogger, type Logger } from "@gatehouse/audit";
import { systemClock, type Clock } from "@gatehouse/clock";

import { MemoryCacheStore } from "./stores";
import type { CachedResponse, CacheEntry, CacheStore } from "./types";

export const DEFAULT_CACHE_TTL_MS = 300_000;

export interface ResponseCacheOptions {
  store?: CacheStore;
  defaultTtlMs?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * TTL-bounded response cache in front of a CacheStore.
 *
 * Staleness is bounded by the TTL and nothing else: there is no
 * invalidation from backend writes.
 *
 * Store failures never reach the caller: reads degrade to a miss and
 * writes are skipped, both logged at warn.
 */
export class ResponseCache {
  readonly defaultTtlMs: number;
  private readonly store: CacheStore;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: ResponseCacheOptions = {}) {
    this.store = options.store ?? new MemoryCacheStore();
    this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  async get(
    fingerprint: string,
    now: number = this.clock.now()
  ): Promise<CachedResponse | undefined> {
    let entry: CacheEntry | undefined;
    try {
      entry = await this.store.get(fingerprint);
    } catch (err) {
      this.logger.warn("cache read failed, treating as miss", {
        fingerprint,
        error: describeError(err),
      });
      return undefined;
    }

    if (!entry) return undefined;

    if (now > entry.recordedAt + entry.ttlMs) {
      this.evict(fingerprint);
      return undefined;
    }

    return entry.response;
  }

  async put(
    fingerprint: string,
    response: CachedResponse,
    now: number = this.clock.now(),
    ttlMs: number = this.defaultTtlMs
  ): Promise<void> {
    if (!(ttlMs > 0)) return;

    try {
      await this.store.set(fingerprint, { response, recordedAt: now, ttlMs }, ttlMs);
    } catch (err) {
      this.logger.warn("cache write failed, response not cached", {
        fingerprint,
        error: describeError(err),
      });
    }
  }

  clear(): Promise<void> {
    return this.store.clear();
  }

  private evict(fingerprint: string): void {
    this.store.delete(fingerprint).catch((err: unknown) => {
      this.logger.debug("expired entry eviction failed", {
        fingerprint,
        error: describeError(err),
      });
    });
  }
}
