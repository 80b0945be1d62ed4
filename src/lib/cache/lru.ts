import type { CacheLookup } from "../types.ts";

type CacheEntry<V> = {
  value: V;
  expiresAt: number;
};

export type RemovalReason = "evicted" | "expired" | "deleted";

type LRUOptions<K, V> = {
  maxSize: number;
  ttlMs: number;
  onEvict?: (key: K, value: V, reason: RemovalReason) => void;
};

export type LRUStats = {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  expirations: number;
  evictions: number;
};

function assertTtl(ttlMs: number) {
  if (!Number.isFinite(ttlMs) || ttlMs < 0) {
    throw new RangeError(`TTL must be a non-negative number of ms, got ${ttlMs}`);
  }
}

/**
 * Bounded key-value cache with least-recently-used eviction and per-entry
 * expiry.
 *
 * Recency lives in the Map's insertion order: the first key is the LRU tail,
 * the last key the most recently touched. Every method is synchronous, so a
 * caller never sees the map and the recency order out of step.
 *
 * Expired entries are purged lazily when a lookup observes them. Until then
 * they still hold a slot and remain eviction candidates in recency order.
 */
export class LRUCache<K, V> {
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly onEvict?: LRUOptions<K, V>["onEvict"];
  private readonly map = new Map<K, CacheEntry<V>>();

  private hits = 0;
  private misses = 0;
  private expirations = 0;
  private evictions = 0;

  constructor(options: LRUOptions<K, V>) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new RangeError(
        `maxSize must be a positive integer, got ${options.maxSize}`
      );
    }
    assertTtl(options.ttlMs);
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.onEvict = options.onEvict;
  }

  get size() {
    return this.map.size;
  }

  get capacity() {
    return this.maxSize;
  }

  get defaultTtlMs() {
    return this.ttlMs;
  }

  get(key: K): CacheLookup<V> {
    const entry = this.map.get(key);
    if (!entry) {
      this.misses += 1;
      return { found: false };
    }
    if (entry.expiresAt <= Date.now()) {
      this.remove(key, entry, "expired");
      this.misses += 1;
      return { found: false };
    }
    this.map.delete(key);
    this.map.set(key, entry);
    this.hits += 1;
    return { found: true, value: entry.value };
  }

  /** Lookup that neither promotes nor purges. */
  peek(key: K): CacheLookup<V> {
    const entry = this.map.get(key);
    if (!entry || entry.expiresAt <= Date.now()) return { found: false };
    return { found: true, value: entry.value };
  }

  has(key: K): boolean {
    return this.peek(key).found;
  }

  /** Remaining lifetime of a live entry in ms, or null when absent or expired. */
  ttlOf(key: K): number | null {
    const entry = this.map.get(key);
    if (!entry) return null;
    const remaining = entry.expiresAt - Date.now();
    return remaining > 0 ? remaining : null;
  }

  set(key: K, value: V, ttlMs?: number) {
    const ttl = ttlMs ?? this.ttlMs;
    assertTtl(ttl);
    const expiresAt = Date.now() + ttl;

    const existing = this.map.get(key);
    if (existing) {
      existing.value = value;
      existing.expiresAt = expiresAt;
      this.map.delete(key);
      this.map.set(key, existing);
      return;
    }

    if (this.map.size >= this.maxSize) {
      this.evictOldest();
    }
    this.map.set(key, { value, expiresAt });
  }

  /**
   * Returns true only when a live entry was removed. An expired entry is
   * purged as well but reported as absent.
   */
  delete(key: K): boolean {
    const entry = this.map.get(key);
    if (!entry) return false;
    if (entry.expiresAt <= Date.now()) {
      this.remove(key, entry, "expired");
      return false;
    }
    this.remove(key, entry, "deleted");
    return true;
  }

  /** Resident keys, most recently used first. Stale entries included. */
  keys(): K[] {
    return Array.from(this.map.keys()).reverse();
  }

  /** Drops every expired entry and returns how many were removed. */
  prune(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.map) {
      if (entry.expiresAt <= now) {
        this.remove(key, entry, "expired");
        removed += 1;
      }
    }
    return removed;
  }

  stats(): LRUStats {
    return {
      size: this.map.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      expirations: this.expirations,
      evictions: this.evictions,
    };
  }

  private evictOldest() {
    const oldest = this.map.entries().next();
    if (oldest.done) return;
    const [key, entry] = oldest.value;
    this.remove(key, entry, "evicted");
  }

  private remove(key: K, entry: CacheEntry<V>, reason: RemovalReason) {
    this.map.delete(key);
    if (reason === "evicted") this.evictions += 1;
    if (reason === "expired") this.expirations += 1;
    this.onEvict?.(key, entry.value, reason);
  }
}
