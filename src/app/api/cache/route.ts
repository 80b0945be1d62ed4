import { createCacheRuntime } from "@/lib/cache";
import { createCacheHandlers } from "@/lib/cache-handlers";
import { getEnv } from "@/lib/env";
import { createLogger } from "@/lib/logger";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

// One cache per server process, built when the route module loads.
const env = getEnv();
const handlers = createCacheHandlers(
  createCacheRuntime(env, createLogger({ level: env.LOG_LEVEL }))
);

export function GET(request: Request) {
  return handlers.GET(request);
}

export function POST(request: Request) {
  return handlers.POST(request);
}

export function DELETE(request: Request) {
  return handlers.DELETE(request);
}
