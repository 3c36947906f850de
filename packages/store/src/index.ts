export {
  createRedisClient,
  type RedisStoreClient,
  type RedisStoreClientOptions,
  type ScriptCall,
} from "./adapters/redis/redis-client"
export {
  DELETE_SCRIPT,
  PUT_IF_ABSENT_SCRIPT,
  PUT_SCRIPT,
  STORE_SCRIPTS,
  type StoreScript,
} from "./adapters/redis/scripts"
export { IteratorBridge } from "./core/bridge/iterator-bridge"
export {
  createPartitionKeyCodec,
  type PartitionKeyCodecOptions,
} from "./core/codec/partition-key-codec"
export { createJsonCodec, int32Codec, utf8Codec } from "./core/codec/value-codecs"
export {
  type LoadStoreConfigOptions,
  loadStoreConfig,
  type StoreConfig,
  type StoreEnv,
  storeEnvSchema,
  toStoreConfig,
} from "./core/config/store-config"
export {
  type CreateStoreDeps,
  type CreateStoreOptions,
  createRedisPartitionedStore,
} from "./core/create-store"
export { isStoreError, StoreError, type StoreErrorCode } from "./core/errors/store-error"
export { type RetryPolicy, StoreRetry } from "./core/retry/store-retry"
export { DEFAULT_SCAN_PAGE_SIZE, startScan } from "./core/scan/scan-engine"
export {
  RedisPartitionedStore,
  type RedisPartitionedStoreDeps,
  type RedisPartitionedStoreOptions,
} from "./core/store/redis-partitioned-store"
export type { Codec } from "./ports/codec"
export type { KeyValue } from "./ports/key-value"
export type { KeyValueIterator } from "./ports/key-value-iterator"
export type { KvFound, KvNotFound, KvResult } from "./ports/kv-result"
export type { Notification } from "./ports/notification"
export type { EncodedKey, PartitionKeyCodec } from "./ports/partition-key-codec"
export type {
  KeyValueEntry,
  PartitionedKeyValueStore,
  StoreContext,
} from "./ports/store"
