import { RemoteStoreError } from "../api-errors.ts";
import type { Logger } from "../logger.ts";
import type { CacheLookup, CacheStoreInfo, CacheValue } from "../types.ts";
import type { LRUCache } from "./lru.ts";
import type { RemoteEntry, RemoteStore } from "./persistent.ts";

/** Async contract the HTTP layer talks to, whichever tiers sit behind it. */
export interface CacheStore<V = CacheValue> {
  put(key: string, value: V, ttlMs: number): Promise<void>;
  get(key: string): Promise<CacheLookup<V>>;
  delete(key: string): Promise<boolean>;
  describe(): CacheStoreInfo;
}

export class LocalCacheStore<V = CacheValue> implements CacheStore<V> {
  constructor(private readonly cache: LRUCache<string, V>) {}

  put(key: string, value: V, ttlMs: number): Promise<void> {
    this.cache.set(key, value, ttlMs);
    return Promise.resolve();
  }

  get(key: string): Promise<CacheLookup<V>> {
    return Promise.resolve(this.cache.get(key));
  }

  delete(key: string): Promise<boolean> {
    return Promise.resolve(this.cache.delete(key));
  }

  describe(): CacheStoreInfo {
    return {
      mode: "local",
      capacity: this.cache.capacity,
      defaultTtlMs: this.cache.defaultTtlMs,
      readThrough: false,
    };
  }
}

type TieredCacheOptions = {
  local: LRUCache<string, CacheValue>;
  remote: RemoteStore;
  logger: Logger;
  /** Copy remote hits into the local tier. Defaults to true. */
  readThrough?: boolean;
};

/**
 * Local LRU tier in front of a remote store. Writes and deletes go to both
 * tiers, local first. Reads consult the remote tier only on a local miss.
 */
export class TieredCache implements CacheStore<CacheValue> {
  private readonly local: LRUCache<string, CacheValue>;
  private readonly remote: RemoteStore;
  private readonly logger: Logger;
  private readonly readThrough: boolean;
  // Keys with a remote read in flight. Writes bump the generation so a reply
  // that predates them is not copied into the local tier.
  private readonly pendingReads = new Map<
    string,
    { readers: number; generation: number }
  >();

  constructor(options: TieredCacheOptions) {
    this.local = options.local;
    this.remote = options.remote;
    this.logger = options.logger;
    this.readThrough = options.readThrough ?? true;
  }

  async put(key: string, value: CacheValue, ttlMs: number): Promise<void> {
    this.markWritten(key);
    this.local.set(key, value, ttlMs);
    try {
      await this.remote.set(key, value, ttlMs);
    } catch (error) {
      this.logger.error("Remote write failed", { key, error: errorMessage(error) });
      throw error;
    }
  }

  async get(key: string): Promise<CacheLookup<CacheValue>> {
    const local = this.local.get(key);
    if (local.found) return local;

    const pending = this.pendingReads.get(key) ?? { readers: 0, generation: 0 };
    pending.readers += 1;
    this.pendingReads.set(key, pending);
    const generation = pending.generation;

    let entry: RemoteEntry | null;
    try {
      entry = await this.remote.get(key);
    } catch (error) {
      if (!(error instanceof RemoteStoreError)) throw error;
      this.logger.warn("Remote read failed, treating as miss", {
        key,
        error: error.message,
      });
      return { found: false };
    } finally {
      pending.readers -= 1;
      if (pending.readers === 0) this.pendingReads.delete(key);
    }
    if (!entry) return { found: false };

    if (this.readThrough && pending.generation === generation) {
      this.local.set(key, entry.value, entry.ttlMs ?? this.local.defaultTtlMs);
      this.logger.debug("Populated local tier from remote hit", { key });
    }
    return { found: true, value: entry.value };
  }

  async delete(key: string): Promise<boolean> {
    this.markWritten(key);
    const removedLocally = this.local.delete(key);
    let removedRemotely: boolean;
    try {
      removedRemotely = await this.remote.delete(key);
    } catch (error) {
      this.logger.error("Remote delete failed", { key, error: errorMessage(error) });
      throw error;
    }
    return removedLocally || removedRemotely;
  }

  private markWritten(key: string) {
    const pending = this.pendingReads.get(key);
    if (pending) pending.generation += 1;
  }

  describe(): CacheStoreInfo {
    return {
      mode: "tiered",
      capacity: this.local.capacity,
      defaultTtlMs: this.local.defaultTtlMs,
      readThrough: this.readThrough,
    };
  }
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
