import { describe, expect, it } from "vitest";

import { createCacheRuntime } from "@/lib/cache";
import { parseEnv } from "@/lib/env";

import { FakeRemoteStore } from "./helpers/fake-remote";
import { captureLogger } from "./helpers/logs";

describe("createCacheRuntime", () => {
  it("serves from memory when no remote store is configured", () => {
    const { logger, records } = captureLogger();
    const runtime = createCacheRuntime(parseEnv({}), logger);

    expect(runtime.store.describe()).toEqual({
      mode: "local",
      capacity: 3,
      defaultTtlMs: 3_600_000,
      readThrough: false,
    });
    expect(records).toEqual([
      expect.objectContaining({
        level: "info",
        context: { component: "cache" },
        message: "Cache initialised",
        data: runtime.store.describe(),
      }),
    ]);
  });

  it("puts the remote store behind the local tier", async () => {
    const remote = new FakeRemoteStore();
    const runtime = createCacheRuntime(
      parseEnv({ CACHE_CAPACITY: "2", CACHE_READ_THROUGH: "false" }),
      captureLogger().logger,
      { remote }
    );

    expect(runtime.store.describe()).toEqual({
      mode: "tiered",
      capacity: 2,
      defaultTtlMs: 3_600_000,
      readThrough: false,
    });

    await runtime.store.put("a", 1, 1000);
    expect(remote.calls.set).toEqual(["a"]);
    expect(runtime.local.has("a")).toBe(true);
  });

  it("logs removals from the local tier", async () => {
    const { logger, records } = captureLogger();
    const runtime = createCacheRuntime(parseEnv({ CACHE_CAPACITY: "1" }), logger);

    await runtime.store.put("a", 1, 1000);
    await runtime.store.put("b", 2, 1000);

    expect(records.at(-1)).toMatchObject({
      level: "debug",
      message: "Removed key 'a'",
      data: { reason: "evicted" },
    });
  });
});
