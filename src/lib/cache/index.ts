import type { Env } from "../env.ts";
import type { Logger } from "../logger.ts";
import type { CacheValue } from "../types.ts";
import { LRUCache } from "./lru.ts";
import { createKvRemoteStore, type RemoteStore } from "./persistent.ts";
import { LocalCacheStore, TieredCache, type CacheStore } from "./tiered.ts";

export type CacheRuntime = {
  store: CacheStore<CacheValue>;
  local: LRUCache<string, CacheValue>;
  logger: Logger;
};

type RuntimeOverrides = {
  /** Stands in for the KV client, mainly in tests. */
  remote?: RemoteStore;
};

/**
 * Builds the one cache instance a process serves from. Callers pass the
 * result into whatever handles requests.
 */
export function createCacheRuntime(
  env: Env,
  logger: Logger,
  overrides: RuntimeOverrides = {}
): CacheRuntime {
  const cacheLogger = logger.child({ component: "cache" });

  const local = new LRUCache<string, CacheValue>({
    maxSize: env.CACHE_CAPACITY,
    ttlMs: env.CACHE_DEFAULT_TTL,
    onEvict: (key, _value, reason) => {
      cacheLogger.debug(`Removed key '${key}'`, { reason });
    },
  });

  let remote = overrides.remote;
  if (!remote && env.KV_REST_API_URL && env.KV_REST_API_TOKEN) {
    remote = createKvRemoteStore({
      url: env.KV_REST_API_URL,
      token: env.KV_REST_API_TOKEN,
      prefix: env.CACHE_KV_PREFIX,
    });
  }

  const store: CacheStore<CacheValue> = remote
    ? new TieredCache({
        local,
        remote,
        logger: cacheLogger,
        readThrough: env.CACHE_READ_THROUGH,
      })
    : new LocalCacheStore(local);

  cacheLogger.info("Cache initialised", store.describe());
  return { store, local, logger };
}
