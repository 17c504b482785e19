/**
 * TTLCache — bounded in-memory cache with time-to-live expiry
 */

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface TTLCacheOptions {
  /** Time-to-live per entry in ms (default: never expires) */
  defaultTtlMs?: number;
  /** Maximum number of live entries; the oldest insertion is evicted first */
  maxEntries?: number;
}

export class TTLCache<K, V> {
  private readonly store = new Map<K, CacheEntry<V>>();
  private readonly defaultTtlMs: number;
  private readonly maxEntries: number;

  constructor(options: TTLCacheOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? Number.POSITIVE_INFINITY;
    this.maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
  }

  set(key: K, value: V, ttlMs = this.defaultTtlMs): void {
    // Re-inserting moves the key to the back of the eviction order
    this.store.delete(key);

    if (this.store.size >= this.maxEntries) {
      this.prune();
    }
    while (this.store.size >= this.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done === true) break;
      this.store.delete(oldest.value);
    }

    this.store.set(key, { value, expiresAt: Date.now() + ttlMs });
  }

  get(key: K): V | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: K): void {
    this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  /** Remove all expired entries */
  prune(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (now > entry.expiresAt) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.store.size;
  }
}
