// packages/limiter/src/stores.ts

/**
 * Backing store for window counters.
 *
 * `increment` must be a single atomic step: the returned count already
 * includes this request, and no other caller can observe the value in
 * between. The limiter decides on that post-increment count only.
 */
export interface CounterStore {
  increment(key: string, now: number, expiresAt: number): Promise<number>;
  reset(): Promise<void>;
}

interface CounterEntry {
  count: number;
  expiresAt: number;
}

export interface MemoryCounterStoreOptions {
  /** Run an expiry sweep every N writes. Defaults to 1024. */
  sweepEvery?: number;
}

/**
 * Process-local counters. Map updates run synchronously on the event loop,
 * which is what makes increment atomic here.
 *
 * Expiry is check-on-read; the periodic sweep only bounds memory for
 * identities that never come back.
 */
export class MemoryCounterStore implements CounterStore {
  private readonly entries = new Map<string, CounterEntry>();
  private readonly sweepEvery: number;
  private writes = 0;

  constructor(options: MemoryCounterStoreOptions = {}) {
    this.sweepEvery = Math.max(1, options.sweepEvery ?? 1024);
  }

  async increment(key: string, now: number, expiresAt: number): Promise<number> {
    return this.incrementSync(key, now, expiresAt);
  }

  incrementSync(key: string, now: number, expiresAt: number): number {
    if (++this.writes % this.sweepEvery === 0) {
      this.sweep(now);
    }

    const existing = this.entries.get(key);
    if (existing && existing.expiresAt > now) {
      existing.count += 1;
      return existing.count;
    }

    this.entries.set(key, { count: 1, expiresAt });
    return 1;
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  async reset(): Promise<void> {
    this.entries.clear();
    this.writes = 0;
  }
}

export interface CounterTransaction {
  incr(key: string): CounterTransaction;
  pexpireat(key: string, unixTimeMs: number): CounterTransaction;
  exec(): Promise<Array<[Error | null, unknown]> | null>;
}

/**
 * The slice of an ioredis client the Redis counter store uses.
 * An `ioredis` Redis instance satisfies it as-is.
 */
export interface RedisCounterClient {
  multi(): CounterTransaction;
  scan(
    cursor: string,
    matchToken: "MATCH",
    pattern: string,
    countToken: "COUNT",
    count: number
  ): Promise<[string, string[]]>;
  del(...keys: string[]): Promise<number>;
}

export interface RedisCounterStoreOptions {
  keyPrefix?: string;
}

/**
 * Counters shared by every gateway instance pointing at the same Redis.
 * INCR is atomic server-side; PEXPIREAT lets Redis discard past windows.
 */
export class RedisCounterStore implements CounterStore {
  private readonly keyPrefix: string;

  constructor(
    private readonly redis: RedisCounterClient,
    options: RedisCounterStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? "gatehouse:rl:";
  }

  async increment(key: string, _now: number, expiresAt: number): Promise<number> {
    const fullKey = this.keyPrefix + key;
    const results = await this.redis
      .multi()
      .incr(fullKey)
      .pexpireat(fullKey, Math.ceil(expiresAt))
      .exec();

    if (!results) {
      throw new Error(`rate counter transaction aborted for ${fullKey}`);
    }

    const [incrErr, count] = results[0] ?? [];
    if (incrErr) throw incrErr;
    if (typeof count !== "number") {
      throw new Error(`unexpected INCR reply for ${fullKey}: ${String(count)}`);
    }
    return count;
  }

  async reset(): Promise<void> {
    let cursor = "0";
    do {
      const [next, keys] = await this.redis.scan(cursor, "MATCH", `${this.keyPrefix}*`, "COUNT", 100);
      if (keys.length) await this.redis.del(...keys);
      cursor = next;
    } while (cursor !== "0");
  }
}
