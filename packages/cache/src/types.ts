// packages/cache/src/types.ts

/**
 * Response as the gateway relays it. Header names are lower-case.
 */
export interface CachedResponse {
  status: number;
  /** `set-cookie` may be a list. */
  headers: Record<string, string | string[]>;
  body: Buffer;
}

export interface CacheEntry {
  response: CachedResponse;
  /** Epoch ms the entry was written. */
  recordedAt: number;
  ttlMs: number;
}

/**
 * Key-value backend with TTL support. Implementations may drop entries
 * early; they must never be relied on to drop them on time (the
 * ResponseCache checks recordedAt + ttlMs itself).
 */
export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  set(key: string, entry: CacheEntry, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}
