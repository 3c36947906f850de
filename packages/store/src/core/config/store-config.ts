import { ObjectSource, EnvSource, loadConfig, type ConfigSource } from "@shardkv/config"
import { logLevelNames, type LogLevelName } from "@shardkv/logger"
import { z } from "zod"
import type { RetryPolicy } from "../retry/store-retry"

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

export const storeEnvSchema = z.object({
  REDIS_URL: z.string().default("redis://localhost:6379"),
  STORE_NAME: z.string().min(1).default("store"),
  STORE_KEY_PREFIX: z.string().min(1).default("kv"),
  STORE_INDEX_KEY: z.string().min(1).default("kv:index"),
  STORE_SCAN_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  STORE_RETRY_INITIAL_MS: z.coerce.number().int().nonnegative().default(1000),
  STORE_RETRY_MAX_MS: z.coerce.number().int().nonnegative().default(60_000),
  STORE_RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(100_000),
  STORE_RETRY_MAX_ELAPSED_MS: z.coerce.number().int().nonnegative().default(600_000),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: booleanFlag.default(false),
})

export type StoreEnv = z.infer<typeof storeEnvSchema>

export type StoreConfig = {
  name: string
  redis: { url: string }
  keys: { prefix: string; indexKey: string }
  scan: { pageSize: number }
  retry: RetryPolicy
  log: { level: LogLevelName; prettify: boolean }
}

export function toStoreConfig(env: StoreEnv): StoreConfig {
  if (env.STORE_RETRY_MAX_MS < env.STORE_RETRY_INITIAL_MS) {
    throw new RangeError(
      `STORE_RETRY_MAX_MS must be >= STORE_RETRY_INITIAL_MS (got ${env.STORE_RETRY_MAX_MS} < ${env.STORE_RETRY_INITIAL_MS})`,
    )
  }

  return {
    name: env.STORE_NAME,
    redis: { url: env.REDIS_URL },
    keys: { prefix: env.STORE_KEY_PREFIX, indexKey: env.STORE_INDEX_KEY },
    scan: { pageSize: env.STORE_SCAN_BATCH_SIZE },
    retry: {
      initialDelayMs: env.STORE_RETRY_INITIAL_MS,
      maxDelayMs: env.STORE_RETRY_MAX_MS,
      maxAttempts: env.STORE_RETRY_MAX_ATTEMPTS,
      maxElapsedMs: env.STORE_RETRY_MAX_ELAPSED_MS,
    },
    log: { level: env.LOG_LEVEL, prettify: env.LOG_PRETTY },
  }
}

export type LoadStoreConfigOptions = {
  /** Defaults to process.env. */
  env?: Record<string, string | undefined>

  /** Extra sources applied between the environment and `overrides`, e.g. a DotenvSource. */
  sources?: ConfigSource[]

  overrides?: Partial<Record<keyof StoreEnv, string | number | boolean>>
}

/**
 * Resolves the store settings from the environment. Later sources win:
 * environment, then `sources`, then `overrides`.
 */
export async function loadStoreConfig(options: LoadStoreConfigOptions = {}): Promise<StoreConfig> {
  const overrides: Record<string, string> = {}
  for (const [key, value] of Object.entries(options.overrides ?? {})) {
    if (value !== undefined) overrides[key] = String(value)
  }

  const config = await loadConfig({
    schema: storeEnvSchema,
    sources: [
      new EnvSource(options.env ? { env: options.env } : {}),
      ...(options.sources ?? []),
      new ObjectSource(overrides),
    ],
  })

  return toStoreConfig(config.value)
}
