import type { Codec } from "./codec"
import type { KeyValueIterator } from "./key-value-iterator"
import type { KvResult } from "./kv-result"

export type KeyValueEntry<K, V> = readonly [K, V]

/**
 * What the host hands a store when it opens it.
 *
 * @remarks
 * The serdes are fallbacks, used only when the store was built without its
 * own key or value codec.
 */
export type StoreContext<K = unknown, V = unknown> = {
  partition: number
  keyCodec?: Codec<K>
  valueCodec?: Codec<V>
}

/**
 * A partition-scoped key-value store.
 *
 * @remarks
 * `put` and `putAll` are fire-and-forget: they return once the write is
 * dispatched. Terminal write failures surface from the next `flush()` or
 * `close()`. All other remote operations resolve with their result.
 *
 * Every operation except `init`, `isOpen` and `persistent` rejects (or throws,
 * for the synchronous ones) with `store_not_open` outside `init`..`close`.
 * Writes reject a value that encodes to zero bytes with `empty_value`.
 * Closing the store closes every iterator it handed out.
 */
export interface PartitionedKeyValueStore<K, V> {
  readonly name: string

  /** Always true; entries outlive the process. */
  readonly persistent: boolean

  readonly isOpen: boolean

  init(context: StoreContext<K, V>): Promise<void>

  get(key: K): Promise<KvResult<V>>

  put(key: K, value: V): void

  /** Writes only when `key` is absent; resolves with the value found, if any. */
  putIfAbsent(key: K, value: V): Promise<KvResult<V>>

  /** Resolves with the removed value, if any. */
  delete(key: K): Promise<KvResult<V>>

  /**
   * Writes all values, then adds all keys to the partition index. Not atomic
   * across the two steps.
   */
  putAll(entries: readonly KeyValueEntry<K, V>[]): void

  /**
   * Entries with `from <= key <= to` under the store's key comparator, in scan
   * order. The index has no ordering, so this is a filtered full scan.
   */
  range(from: K, to: K): KeyValueIterator<K, V>

  all(): KeyValueIterator<K, V>

  /** Cardinality of the partition index. */
  approximateNumEntries(): Promise<number>

  /** Awaits every dispatched write; rejects with the first terminal failure. */
  flush(): Promise<void>

  close(): Promise<void>
}
