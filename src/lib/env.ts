import { z } from "zod";

import { DurationParseError, parseTtl } from "./duration.ts";

const emptyAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim().length === 0 ? undefined : value;

const envSchema = z.object({
  CACHE_CAPACITY: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().default(3)
  ),
  CACHE_DEFAULT_TTL: z.preprocess(
    emptyAsUndefined,
    z
      .string()
      .default("1h")
      .transform((value, ctx) => {
        try {
          return parseTtl(value);
        } catch (error) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message:
              error instanceof DurationParseError
                ? error.message
                : "Invalid duration",
          });
          return z.NEVER;
        }
      })
  ),
  CACHE_READ_THROUGH: z.preprocess(
    emptyAsUndefined,
    z.enum(["true", "false"]).default("true").transform((value) => value === "true")
  ),
  CACHE_KV_PREFIX: z.preprocess(
    emptyAsUndefined,
    z.string().default("lru-cache:")
  ),
  KV_REST_API_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  KV_REST_API_TOKEN: z.preprocess(emptyAsUndefined, z.string().optional()),
  LOG_LEVEL: z.preprocess(
    emptyAsUndefined,
    z.enum(["debug", "info", "warn", "error"]).default("info")
  ),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export class EnvError extends Error {
  readonly invalidKeys: string[];

  constructor(invalidKeys: string[]) {
    super(`Invalid environment configuration: ${invalidKeys.join(", ")}`);
    this.name = "EnvError";
    this.invalidKeys = invalidKeys;
  }
}

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse({
    CACHE_CAPACITY: source.CACHE_CAPACITY,
    CACHE_DEFAULT_TTL: source.CACHE_DEFAULT_TTL,
    CACHE_READ_THROUGH: source.CACHE_READ_THROUGH,
    CACHE_KV_PREFIX: source.CACHE_KV_PREFIX,
    KV_REST_API_URL: source.KV_REST_API_URL,
    KV_REST_API_TOKEN: source.KV_REST_API_TOKEN,
    LOG_LEVEL: source.LOG_LEVEL,
  });

  if (!parsed.success) {
    const invalidKeys = parsed.error.issues
      .map((issue) => issue.path[0])
      .filter((key): key is string => typeof key === "string");
    throw new EnvError(Array.from(new Set(invalidKeys)));
  }

  return parsed.data;
}

export function getEnv(): Env {
  if (cachedEnv) return cachedEnv;
  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

export function resetEnvCache() {
  cachedEnv = null;
}

export function isKvConfigured(env: Env) {
  return Boolean(env.KV_REST_API_URL && env.KV_REST_API_TOKEN);
}

export function formatEnvError(error: unknown) {
  if (error instanceof EnvError) {
    const suffix = error.invalidKeys.length
      ? ` Invalid: ${error.invalidKeys.join(", ")}.`
      : "";
    return `Server misconfigured.${suffix}`;
  }
  return "Server misconfigured.";
}
