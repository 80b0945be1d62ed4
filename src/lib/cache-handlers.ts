import { NextResponse } from "next/server";
import { z } from "zod";

import { formatCacheApiError, InvalidInputError } from "./api-errors.ts";
import type { CacheStore } from "./cache/tiered.ts";
import { parseTtl } from "./duration.ts";
import type { Logger } from "./logger.ts";
import type { CacheValue } from "./types.ts";

const writeSchema = z.object({
  key: z.string().min(1),
  value: z.union([z.number().int().safe(), z.string()]),
  ttl: z.string(),
});

type CacheWrite = {
  key: string;
  value: CacheValue;
  ttlMs: number;
};

type HandlerDeps = {
  store: CacheStore<CacheValue>;
  logger: Logger;
};

type RouteHandler = (request: Request) => Promise<Response>;

export type CacheHandlers = {
  GET: RouteHandler;
  POST: RouteHandler;
  DELETE: RouteHandler;
};

export async function parseWriteRequest(request: Request): Promise<CacheWrite> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new InvalidInputError("Invalid request body.");
  }

  const parsed = writeSchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidInputError(
      "Invalid request payload.",
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "body"}: ${issue.message}`
      )
    );
  }

  return {
    key: parsed.data.key,
    value: parsed.data.value,
    ttlMs: parseTtl(parsed.data.ttl),
  };
}

function readKey(request: Request): string {
  const key = new URL(request.url).searchParams.get("key");
  if (!key) {
    throw new InvalidInputError("Key not provided.");
  }
  return key;
}

function notFound(key: string) {
  return NextResponse.json(
    { error: `Key '${key}' not found.` },
    { status: 404 }
  );
}

export function createCacheHandlers({ store, logger }: HandlerDeps): CacheHandlers {
  const log = logger.child({ component: "http" });

  const fail = (method: string, error: unknown) => {
    const formatted = formatCacheApiError(error);
    if (formatted.status >= 500) {
      log.error(`${method} /cache failed`, error);
    } else {
      log.debug(`${method} /cache rejected`, { reason: formatted.message });
    }
    return NextResponse.json(
      formatted.issues
        ? { error: formatted.message, issues: formatted.issues }
        : { error: formatted.message },
      { status: formatted.status }
    );
  };

  return {
    async GET(request) {
      try {
        const key = readKey(request);
        const lookup = await store.get(key);
        if (!lookup.found) {
          log.debug("Cache miss", { key });
          return notFound(key);
        }
        log.debug("Cache hit", { key });
        return NextResponse.json({ key, value: lookup.value });
      } catch (error) {
        return fail("GET", error);
      }
    },

    async POST(request) {
      try {
        const write = await parseWriteRequest(request);
        await store.put(write.key, write.value, write.ttlMs);
        log.info("Key stored", { key: write.key, ttlMs: write.ttlMs });
        return NextResponse.json(
          { key: write.key, stored: true },
          { status: 201 }
        );
      } catch (error) {
        return fail("POST", error);
      }
    },

    async DELETE(request) {
      try {
        const key = readKey(request);
        const removed = await store.delete(key);
        if (!removed) {
          log.debug("Delete of absent key", { key });
          return notFound(key);
        }
        log.info("Key deleted", { key });
        return NextResponse.json({ key, deleted: true });
      } catch (error) {
        return fail("DELETE", error);
      }
    },
  };
}
