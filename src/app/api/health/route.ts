import { NextResponse } from "next/server";

import { formatEnvError, getEnv, isKvConfigured, type Env } from "@/lib/env";
import pkg from "../../../../package.json";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  let env: Env;
  try {
    env = getEnv();
  } catch (error) {
    return NextResponse.json(
      { ok: false, error: formatEnvError(error) },
      { status: 500 }
    );
  }

  return NextResponse.json({
    ok: true,
    capacity: env.CACHE_CAPACITY,
    defaultTtlMs: env.CACHE_DEFAULT_TTL,
    tiered: isKvConfigured(env),
    readThrough: env.CACHE_READ_THROUGH,
    version: pkg.version,
  });
}
