// This module provides a bounded in-memory cache with fixed time-to-live and lazy stale eviction.

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
}

// Reads and writes are synchronous, so each get-check-set runs to completion on the event loop
// without interleaving another request.
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  public constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = Math.max(1, options.maxEntries);
    this.now = options.now ?? Date.now;
  }

  public get size(): number {
    return this.entries.size;
  }

  // This method returns a live entry and drops the entry when it has gone stale.
  public get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  // This method stores one value and runs an eviction pass so the cache stays within its bound.
  public set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
    this.evict();
  }

  public getOrCreate(key: string, create: () => V): V {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = create();
    this.set(key, value);
    return value;
  }

  public clear(): void {
    this.entries.clear();
  }

  private evict(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }

    // Map iteration order is insertion order, so the first keys are the oldest writes.
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }
}
