/**
 * Time-bounded LRU cache for hierarchy lookups
 *
 * Entries expire `ttlSeconds` after they are written. Once `maxSize` live
 * entries are held, writing a new key evicts the least recently used one.
 */

/**
 * Cache construction options
 */
export interface TtlCacheOptions {
  /** Seconds an entry stays valid after it is written */
  ttlSeconds: number;
  /** Maximum number of entries before LRU eviction */
  maxSize: number;
}

/**
 * Lookup counters and live entry count
 */
export interface TtlCacheStats {
  hits: number;
  misses: number;
  size: number;
}

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export class TtlCache<K, V> {
  private cache: Map<K, CacheEntry<V>>;
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private hits = 0;
  private misses = 0;

  constructor(options: TtlCacheOptions) {
    if (options.maxSize < 1) {
      throw new RangeError(`maxSize must be at least 1, got ${options.maxSize}`);
    }
    this.cache = new Map();
    this.ttlMs = options.ttlSeconds * 1000;
    this.maxSize = options.maxSize;
  }

  get(key: K): V | undefined {
    const entry = this.liveEntry(key);
    if (entry === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else {
      this.purgeExpired();
      if (this.cache.size >= this.maxSize) {
        // Remove least recently used (first item)
        const firstKey = this.cache.keys().next();
        if (firstKey.done !== true) {
          this.cache.delete(firstKey.value);
        }
      }
    }
    this.cache.set(key, { value, expiresAt: Date.now() + this.ttlMs });
  }

  has(key: K): boolean {
    return this.liveEntry(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    this.purgeExpired();
    return this.cache.size;
  }

  /**
   * Return the cached value for `key`, or load, store and return it.
   *
   * Nothing is stored when `load` rejects.
   */
  async getOrLoad(key: K, load: () => Promise<V>): Promise<V> {
    const entry = this.liveEntry(key);
    if (entry !== undefined) {
      this.hits++;
      this.cache.delete(key);
      this.cache.set(key, entry);
      return entry.value;
    }
    this.misses++;
    const value = await load();
    this.set(key, value);
    return value;
  }

  /**
   * Hits and misses counted by `get` and `getOrLoad` since construction
   */
  stats(): TtlCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.size };
  }

  private liveEntry(key: K): CacheEntry<V> | undefined {
    const entry = this.cache.get(key);
    if (entry === undefined) {
      return undefined;
    }
    if (Date.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    return entry;
  }

  private purgeExpired(): void {
    const now = Date.now();
    for (const [key, entry] of this.cache) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
      }
    }
  }
}
