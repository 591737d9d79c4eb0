/**
 * Rate-limit counter stores.
 *
 * A store only knows how to increment a key that expires after `ttlMs`;
 * window arithmetic lives in the middleware. The in-memory store suits a
 * single process. For several processes use the Redis store.
 */

export interface RateLimitStore {
  /**
   * Increment `key` and return the new count. The first increment of a key
   * starts its expiry clock.
   */
  increment(key: string, ttlMs: number): Promise<number>;
  close?(): Promise<void>;
}

interface CounterEntry {
  count: number;
  expiresAt: number;
}

export interface MemoryRateLimitStoreOptions {
  /** Interval between sweeps of expired keys. Default: 60_000 */
  cleanupIntervalMs?: number;
  /** Clock, injectable for tests. */
  now?: () => number;
}

export class MemoryRateLimitStore implements RateLimitStore {
  private readonly counters = new Map<string, CounterEntry>();
  private readonly now: () => number;
  private readonly cleanupInterval: NodeJS.Timeout;

  constructor(options: MemoryRateLimitStoreOptions = {}) {
    this.now = options.now ?? Date.now;

    // Periodic cleanup of expired entries to prevent memory growth
    this.cleanupInterval = setInterval(() => this.sweep(), options.cleanupIntervalMs ?? 60_000);
    this.cleanupInterval.unref();
  }

  async increment(key: string, ttlMs: number): Promise<number> {
    const now = this.now();
    const entry = this.counters.get(key);
    if (!entry || entry.expiresAt <= now) {
      this.counters.set(key, { count: 1, expiresAt: now + ttlMs });
      return 1;
    }
    entry.count++;
    return entry.count;
  }

  /** Number of live keys. */
  get size(): number {
    return this.counters.size;
  }

  sweep(): void {
    const now = this.now();
    for (const [key, entry] of this.counters) {
      if (entry.expiresAt <= now) {
        this.counters.delete(key);
      }
    }
  }

  async close(): Promise<void> {
    clearInterval(this.cleanupInterval);
    this.counters.clear();
  }
}
