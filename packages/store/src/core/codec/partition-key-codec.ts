import type { Codec } from "../../ports/codec"
import type { EncodedKey, PartitionKeyCodec } from "../../ports/partition-key-codec"

export type PartitionKeyCodecOptions<K> = {
  keyCodec: Codec<K>

  /** Prepended to every value key of the store. */
  keyPrefix: Uint8Array

  /** Prepended to the partition number to form the index set key. */
  indexKeyTemplate: Uint8Array
}

export function partitionBytes(partition: number): Buffer {
  if (!Number.isInteger(partition) || partition < 0 || partition > 0x7fff_ffff) {
    throw new RangeError(`partition must be an integer in [0, 2^31) (got ${partition})`)
  }

  const out = Buffer.alloc(4)
  out.writeInt32BE(partition)
  return out
}

/**
 * The prefix and the partition are fixed-width per store, so keys of one
 * partition never collide as long as the key codec is injective.
 */
export function createPartitionKeyCodec<K>(
  options: PartitionKeyCodecOptions<K>,
): PartitionKeyCodec<K> {
  const { keyCodec } = options
  const keyPrefix = Buffer.from(options.keyPrefix)
  const indexKeyTemplate = Buffer.from(options.indexKeyTemplate)

  const prefixKey = (vanillaKey: Uint8Array, partition: number): Buffer =>
    Buffer.concat([keyPrefix, partitionBytes(partition), vanillaKey])

  return {
    encodeKey(key: K, partition: number): EncodedKey {
      const vanillaKey = Buffer.from(keyCodec.encode(key))

      return { vanillaKey, prefixedKey: prefixKey(vanillaKey, partition) }
    },

    decodeKey: (vanillaKey) => keyCodec.decode(vanillaKey),

    prefixKey,

    indexKey: (partition) => Buffer.concat([indexKeyTemplate, partitionBytes(partition)]),
  }
}
