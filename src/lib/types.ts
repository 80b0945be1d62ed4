export type CacheValue = number | string;

export type CacheLookup<V> = { found: true; value: V } | { found: false };

export type CacheMode = "local" | "tiered";

export type CacheStoreInfo = {
  mode: CacheMode;
  capacity: number;
  defaultTtlMs: number;
  readThrough: boolean;
};
