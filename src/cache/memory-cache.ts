// ---------------------------------------------------------------------------
// Generic in-memory LRU cache with optional per-entry TTL.
// ---------------------------------------------------------------------------

interface CacheEntry<T> {
  value: T;
  /** `null` means the entry never expires. */
  expiresAt: number | null;
}

/**
 * LRU cache backed by a `Map`, which keeps insertion order.
 * - `get` moves the entry to the end (most recently used).
 * - `set` at capacity evicts the first (least recently used) entry.
 * - Expired entries are removed lazily on `get`.
 */
export class MemoryCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly maxEntries: number;

  constructor(maxEntries: number) {
    if (maxEntries < 1) {
      throw new RangeError("maxEntries must be at least 1");
    }
    this.maxEntries = maxEntries;
  }

  get(key: string): T | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAt !== null && Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    this.store.delete(key);
    this.store.set(key, entry);
    return entry.value;
  }

  /** Without `ttlMs` the entry lives until evicted or cleared. */
  set(key: string, value: T, ttlMs?: number): void {
    if (this.store.has(key)) {
      this.store.delete(key);
    } else if (this.store.size >= this.maxEntries) {
      const oldest = this.store.keys().next();
      if (!oldest.done) this.store.delete(oldest.value);
    }

    this.store.set(key, {
      value,
      expiresAt: ttlMs === undefined ? null : Date.now() + ttlMs,
    });
  }

  delete(key: string): void {
    this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
