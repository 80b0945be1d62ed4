import { createClient } from "@vercel/kv";

import { RemoteStoreError, type RemoteOperation } from "../api-errors.ts";
import type { CacheValue } from "../types.ts";

const DEFAULT_KV_PREFIX = "lru-cache:";

// Redis PTTL sentinels.
const PTTL_MISSING = -2;
const PTTL_NO_EXPIRY = -1;

export type RemoteEntry = {
  value: CacheValue;
  /** Remaining lifetime in ms, or null when the store keeps it forever. */
  ttlMs: number | null;
};

export interface RemoteStore {
  get(key: string): Promise<RemoteEntry | null>;
  set(key: string, value: CacheValue, ttlMs: number): Promise<void>;
  delete(key: string): Promise<boolean>;
}

/**
 * The handful of Redis commands the remote tier needs. Payloads are stored
 * and returned verbatim; `KvRemoteStore` owns their encoding.
 */
export interface KvClient {
  get(key: string): Promise<string | null>;
  set(key: string, payload: string, px: number): Promise<unknown>;
  del(key: string): Promise<number>;
  pttl(key: string): Promise<number>;
}

export function createKvClient(url: string, token: string): KvClient {
  // Replies come back as raw strings so "42" and 42 stay distinct.
  const kv = createClient({ url, token, automaticDeserialization: false });
  return {
    get: (key) => kv.get<string>(key),
    set: (key, payload, px) => kv.set(key, payload, { px }),
    del: (key) => kv.del(key),
    pttl: (key) => kv.pttl(key),
  };
}

function isCacheValue(value: unknown): value is CacheValue {
  return typeof value === "string" || typeof value === "number";
}

function encodeValue(value: CacheValue) {
  return JSON.stringify(value);
}

function decodeValue(key: string, payload: string): CacheValue {
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch (error) {
    throw new RemoteStoreError(
      "get",
      key,
      new Error("stored payload is not JSON", { cause: error })
    );
  }
  if (!isCacheValue(value)) {
    throw new RemoteStoreError(
      "get",
      key,
      new Error(`unsupported value type "${value === null ? "null" : typeof value}"`)
    );
  }
  return value;
}

export class KvRemoteStore implements RemoteStore {
  private readonly client: KvClient;
  private readonly prefix: string;

  constructor(client: KvClient, prefix = DEFAULT_KV_PREFIX) {
    this.client = client;
    this.prefix = prefix;
  }

  async get(key: string): Promise<RemoteEntry | null> {
    const payload = await this.run("get", key, () =>
      this.client.get(this.prefixed(key))
    );
    if (payload === null) return null;
    const value = decodeValue(key, payload);

    const pttl = await this.run("get", key, () =>
      this.client.pttl(this.prefixed(key))
    );
    if (pttl === PTTL_MISSING) return null;
    return { value, ttlMs: pttl === PTTL_NO_EXPIRY ? null : pttl };
  }

  async set(key: string, value: CacheValue, ttlMs: number): Promise<void> {
    // Redis rejects PX 0; a zero TTL means the entry is already gone.
    if (ttlMs <= 0) {
      await this.delete(key);
      return;
    }
    const px = Math.max(1, Math.ceil(ttlMs));
    await this.run("set", key, () =>
      this.client.set(this.prefixed(key), encodeValue(value), px)
    );
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.run("delete", key, () =>
      this.client.del(this.prefixed(key))
    );
    return removed > 0;
  }

  private prefixed(key: string) {
    return `${this.prefix}${key}`;
  }

  private async run<T>(
    operation: RemoteOperation,
    key: string,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RemoteStoreError) throw error;
      throw new RemoteStoreError(operation, key, error);
    }
  }
}

export function createKvRemoteStore(options: {
  url: string;
  token: string;
  prefix?: string;
}) {
  return new KvRemoteStore(
    createKvClient(options.url, options.token),
    options.prefix
  );
}
