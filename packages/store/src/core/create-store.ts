import { type Clock, SystemClock } from "@shardkv/clock"
import { createPinoLogger, type Logger } from "@shardkv/logger"
import { createRetryExecutor } from "@shardkv/retry"
import { createRedisClient, type RedisStoreClient } from "../adapters/redis/redis-client"
import type { StoreConfig } from "./config/store-config"
import { StoreRetry } from "./retry/store-retry"
import {
  RedisPartitionedStore,
  type RedisPartitionedStoreOptions,
} from "./store/redis-partitioned-store"

export type CreateStoreOptions<K, V> = Pick<
  RedisPartitionedStoreOptions<K, V>,
  "keyCodec" | "valueCodec" | "compare"
>

export type CreateStoreDeps = {
  /** Defaults to a node-redis client for `config.redis.url`; the store connects and quits it. */
  client?: RedisStoreClient
  clock?: Clock
  logger?: Logger
}

/**
 * Wires a store from resolved settings.
 *
 * @example
 * ```ts
 * const config = await loadStoreConfig()
 * const store = createRedisPartitionedStore(config, {
 *   keyCodec: int32Codec,
 *   valueCodec: createJsonCodec<Order>(),
 *   compare: (a, b) => a - b,
 * })
 *
 * await store.init({ partition: 3 })
 * ```
 */
export function createRedisPartitionedStore<K, V>(
  config: StoreConfig,
  options: CreateStoreOptions<K, V> = {},
  deps: CreateStoreDeps = {},
): RedisPartitionedStore<K, V> {
  const client = deps.client ?? createRedisClient({ url: config.redis.url })
  const clock = deps.clock ?? new SystemClock()
  const logger = deps.logger ?? createPinoLogger({}, config.log)

  const retry = new StoreRetry(
    { executor: createRetryExecutor({ clock }), logger },
    config.retry,
  )

  return new RedisPartitionedStore<K, V>(
    { client, retry, logger },
    {
      ...options,
      name: config.name,
      keyPrefix: config.keys.prefix,
      indexKey: config.keys.indexKey,
      pageSize: config.scan.pageSize,
    },
  )
}
