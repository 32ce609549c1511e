// packages/cache/src/stores.ts

import type { CacheEntry, CacheStore } from "./types";

export interface MemoryCacheStoreOptions {
  /** Entry cap; the oldest write is evicted first. Defaults to 1000. */
  maxEntries?: number;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 1000);
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, entry: CacheEntry, _ttlMs: number): Promise<void> {
    // Re-inserting moves the key to the back of the eviction order.
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, entry);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * The slice of an ioredis client the Redis cache store uses.
 * An `ioredis` Redis instance satisfies it as-is.
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, millisecondsToken: "PX", milliseconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(
    cursor: string,
    matchToken: "MATCH",
    pattern: string,
    countToken: "COUNT",
    count: number
  ): Promise<[string, string[]]>;
}

export interface RedisCacheStoreOptions {
  keyPrefix?: string;
}

interface SerializedEntry {
  status: number;
  headers: Record<string, string | string[]>;
  body: string; // base64
  recordedAt: number;
  ttlMs: number;
}

function isHeaderValue(value: unknown): value is string | string[] {
  return (
    typeof value === "string" ||
    (Array.isArray(value) && value.every((v) => typeof v === "string"))
  );
}

function isHeaderRecord(value: unknown): value is Record<string, string | string[]> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(isHeaderValue)
  );
}

function isSerializedEntry(value: unknown): value is SerializedEntry {
  if (typeof value !== "object" || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    typeof v.status === "number" &&
    isHeaderRecord(v.headers) &&
    typeof v.body === "string" &&
    typeof v.recordedAt === "number" &&
    typeof v.ttlMs === "number"
  );
}

export function serializeEntry(entry: CacheEntry): string {
  const out: SerializedEntry = {
    status: entry.response.status,
    headers: entry.response.headers,
    body: entry.response.body.toString("base64"),
    recordedAt: entry.recordedAt,
    ttlMs: entry.ttlMs,
  };
  return JSON.stringify(out);
}

/**
 * Returns undefined for anything that is not a well-formed entry, so a
 * corrupted or foreign key reads as a miss.
 */
export function deserializeEntry(raw: string): CacheEntry | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isSerializedEntry(parsed)) return undefined;

  return {
    response: {
      status: parsed.status,
      headers: parsed.headers,
      body: Buffer.from(parsed.body, "base64"),
    },
    recordedAt: parsed.recordedAt,
    ttlMs: parsed.ttlMs,
  };
}

/**
 * Shared cache for several gateway instances. Redis expires keys with PX,
 * which bounds memory; freshness is still judged by the ResponseCache.
 */
export class RedisCacheStore implements CacheStore {
  private readonly keyPrefix: string;

  constructor(
    private readonly redis: RedisCacheClient,
    options: RedisCacheStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? "gatehouse:";
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const raw = await this.redis.get(this.keyPrefix + key);
    return raw === null ? undefined : deserializeEntry(raw);
  }

  async set(key: string, entry: CacheEntry, ttlMs: number): Promise<void> {
    await this.redis.set(this.keyPrefix + key, serializeEntry(entry), "PX", Math.max(1, Math.ceil(ttlMs)));
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.keyPrefix + key);
  }

  async clear(): Promise<void> {
    let cursor = "0";
    do {
      const [next, keys] = await this.redis.scan(cursor, "MATCH", `${this.keyPrefix}cache:*`, "COUNT", 100);
      if (keys.length) await this.redis.del(...keys);
      cursor = next;
    } while (cursor !== "0");
  }
}
