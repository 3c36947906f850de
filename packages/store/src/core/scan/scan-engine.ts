import { setImmediate as yieldToEventLoop } from "node:timers/promises"
import type { Logger } from "@shardkv/logger"
import type { RedisStoreClient } from "../../adapters/redis/redis-client"
import type { Codec } from "../../ports/codec"
import type { KeyValueIterator } from "../../ports/key-value-iterator"
import type { PartitionKeyCodec } from "../../ports/partition-key-codec"
import { IteratorBridge } from "../bridge/iterator-bridge"
import type { StoreRetry } from "../retry/store-retry"

export const DEFAULT_SCAN_PAGE_SIZE = 50

const FINISHED_CURSOR = "0"

export type ScanEngineDeps<K, V> = {
  client: Pick<RedisStoreClient, "sScan" | "mGet">
  keyCodec: PartitionKeyCodec<K>
  valueCodec: Codec<V>
  retry: StoreRetry
  logger: Logger
}

export type ScanOptions<K> = {
  partition: number
  pageSize: number
  predicate: (key: K) => boolean

  /** Called when the consumer closes the returned iterator. */
  onClose?: () => void
}

type CollectedPage<K> = {
  keys: K[]
  prefixedKeys: Buffer[]
}

/**
 * Starts walking a partition index and returns the iterator it feeds.
 *
 * Pages are requested one at a time: `SSCAN` a page of index members, keep the
 * ones that decode to a key matching the predicate, `MGET` their values and
 * push the pairs into the iterator. Pushing waits while the iterator is full.
 * Closing the iterator stops the walk and any retry in progress.
 */
export function startScan<K, V>(
  deps: ScanEngineDeps<K, V>,
  options: ScanOptions<K>,
): KeyValueIterator<K, V> {
  const bridge = new IteratorBridge<K, V>(options.pageSize, options.onClose)

  new ScanEngine(deps, options, bridge).run().catch((error: unknown) => {
    deps.logger.error("Scan engine failed to report a failure", { op: "scan", err: error })
    bridge.close()
  })

  return bridge
}

/**
 * One walk over a partition index.
 *
 * @remarks
 * Entries are buffered a page at a time, but the members already reported are
 * remembered for the whole walk so repeats from SSCAN are dropped. That set
 * grows with the partition and is released when the walk ends.
 */
export class ScanEngine<K, V> {
  private readonly seen = new Set<string>()

  constructor(
    private readonly deps: ScanEngineDeps<K, V>,
    private readonly options: ScanOptions<K>,
    private readonly bridge: IteratorBridge<K, V>,
  ) {
    if (!Number.isInteger(options.pageSize) || options.pageSize < 1) {
      throw new RangeError(`pageSize must be an integer >= 1 (got ${options.pageSize})`)
    }
  }

  /** Never rejects because of the scan itself: failures become the iterator's failure marker. */
  async run(): Promise<void> {
    try {
      const finished = await this.scan()

      if (finished) {
        await this.bridge.complete()
      } else {
        this.deps.logger.debug("Scan stopped by iterator close", {
          op: "scan",
          partition: this.options.partition,
        })
      }
    } catch (error) {
      await this.bridge.fail(error)
    } finally {
      this.seen.clear()
    }
  }

  /** Resolves true when the index was walked to the end, false when cancelled. */
  private async scan(): Promise<boolean> {
    const { client, keyCodec } = this.deps
    const { partition, pageSize } = this.options
    const indexKey = keyCodec.indexKey(partition)

    let cursor = FINISHED_CURSOR

    while (!this.bridge.closed) {
      const from = cursor
      const page = await this.remote("sscan", () =>
        client.sScan(indexKey, from, { COUNT: pageSize }),
      )
      if (page.cancelled) return false

      const { keys, prefixedKeys } = this.collect(page.value.members)

      if (keys.length > 0) {
        const values = await this.remote("mget", () => client.mGet(prefixedKeys))
        if (values.cancelled) return false

        const delivered = await this.deliver(keys, values.value)
        if (!delivered) return false
      }

      cursor = page.value.cursor.toString()
      if (cursor === FINISHED_CURSOR) return true

      await yieldToEventLoop()
    }

    return false
  }

  private remote<T>(op: string, fn: () => Promise<T>) {
    return this.deps.retry.runCancellable(op, fn, {
      isCancelled: () => this.bridge.closed,
      signal: this.bridge.signal,
    })
  }

  private collect(members: readonly Buffer[]): CollectedPage<K> {
    const { keyCodec } = this.deps
    const { partition, predicate } = this.options
    const page: CollectedPage<K> = { keys: [], prefixedKeys: [] }

    for (const member of members) {
      // SSCAN may return a member more than once over a full iteration.
      const id = member.toString("base64")
      if (this.seen.has(id)) continue
      this.seen.add(id)

      const key = keyCodec.decodeKey(member)
      if (!predicate(key)) continue

      page.keys.push(key)
      page.prefixedKeys.push(keyCodec.prefixKey(member, partition))
    }

    return page
  }

  /** Resolves false when the iterator was closed mid-page. */
  private async deliver(keys: readonly K[], rawValues: readonly (Buffer | null)[]): Promise<boolean> {
    for (const [i, key] of keys.entries()) {
      const raw = rawValues[i]

      // Deleted between SSCAN and MGET.
      if (raw === null || raw === undefined || raw.byteLength === 0) continue

      const pushed = await this.bridge.push({ key, value: this.deps.valueCodec.decode(raw) })
      if (!pushed) return false
    }

    return true
  }
}
