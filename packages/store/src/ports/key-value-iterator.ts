import type { KeyValue } from "./key-value"

/**
 * Pull-based iterator over a store's entries.
 *
 * @remarks
 * Accessors are serialized per iterator, so `hasNext`, `peekNextKey` and
 * `next` may be called from interleaved async flows. `close()` never waits
 * and may be called any number of times, including while another accessor is
 * pending; the pending accessor then resolves as exhausted.
 */
export interface KeyValueIterator<K, V> extends AsyncIterable<KeyValue<K, V>> {
  /** Resolves true when another entry is available. Never consumes it. */
  hasNext(): Promise<boolean>

  /** Key of the next entry. Rejects with `end_of_sequence` when exhausted. */
  peekNextKey(): Promise<K>

  /** Consumes the next entry. Rejects with `end_of_sequence` when exhausted. */
  next(): Promise<KeyValue<K, V>>

  close(): void
}
