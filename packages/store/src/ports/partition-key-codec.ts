export type EncodedKey = {
  /** Key bytes without store prefix or partition, as kept in the partition index */
  readonly vanillaKey: Buffer

  /** Key bytes as stored in the Redis keyspace */
  readonly prefixedKey: Buffer
}

/**
 * Derives Redis keys for one store.
 *
 * Layout:
 * - `prefixedKey = keyPrefix ‖ partition (int32 BE) ‖ vanillaKey`
 * - `indexKey    = indexKeyTemplate ‖ partition (int32 BE)`
 */
export interface PartitionKeyCodec<K> {
  encodeKey(key: K, partition: number): EncodedKey

  decodeKey(vanillaKey: Uint8Array): K

  /** Prefixes an index member that was read back from Redis. */
  prefixKey(vanillaKey: Uint8Array, partition: number): Buffer

  indexKey(partition: number): Buffer
}
