import type { Logger } from "@shardkv/logger"
import type { RedisStoreClient } from "../../adapters/redis/redis-client"
import { isNoScriptError, STORE_SCRIPTS, type StoreScript } from "../../adapters/redis/scripts"
import type { Codec } from "../../ports/codec"
import type { KeyValueIterator } from "../../ports/key-value-iterator"
import type { KvResult } from "../../ports/kv-result"
import type { PartitionKeyCodec } from "../../ports/partition-key-codec"
import type {
  KeyValueEntry,
  PartitionedKeyValueStore,
  StoreContext,
} from "../../ports/store"
import { createPartitionKeyCodec } from "../codec/partition-key-codec"
import {
  emptyValue,
  nullArgument,
  type StoreError,
  storeNotOpen,
  writeFailed,
} from "../errors/store-error"
import type { StoreRetry } from "../retry/store-retry"
import { DEFAULT_SCAN_PAGE_SIZE, startScan } from "../scan/scan-engine"

export type RedisPartitionedStoreDeps = {
  client: RedisStoreClient
  retry: StoreRetry
  logger: Logger
}

export type RedisPartitionedStoreOptions<K, V> = {
  name: string

  /** Prefix of every value key. */
  keyPrefix: string | Uint8Array

  /** Prefix of the per-partition index set keys. */
  indexKey: string | Uint8Array

  /** Falls back to the codec in the init context. */
  keyCodec?: Codec<K>

  /** Falls back to the codec in the init context. */
  valueCodec?: Codec<V>

  /** Key order for `range`. Defaults to comparing encoded key bytes. */
  compare?: (a: K, b: K) => number

  /** Index members fetched per scan page. Defaults to 50. */
  pageSize?: number
}

type OpenState<K, V> = {
  status: "open"
  partition: number
  keys: PartitionKeyCodec<K>
  valueCodec: Codec<V>
  indexKey: Buffer
  compare: (a: K, b: K) => number
  scripts: Readonly<Record<StoreScript, string>>
}

type StoreState<K, V> = { status: "closed" } | OpenState<K, V>

/**
 * Key-value store for one partition, kept in Redis as one string per entry
 * plus one set per partition listing the keys present.
 *
 * @remarks
 * `put`, `putIfAbsent` and `delete` change a value and its index membership in
 * one Lua script. `putAll` cannot: it writes all values with MSET and then adds
 * the keys with SADD, so a failure between the two leaves values that scans do
 * not report.
 */
export class RedisPartitionedStore<K, V> implements PartitionedKeyValueStore<K, V> {
  readonly persistent = true

  private state: StoreState<K, V> = { status: "closed" }
  private logger: Logger
  private readonly pending = new Set<Promise<void>>()
  private readonly iterators = new Set<KeyValueIterator<K, V>>()
  private readonly writeFailures: StoreError[] = []

  constructor(
    private readonly deps: RedisPartitionedStoreDeps,
    private readonly options: RedisPartitionedStoreOptions<K, V>,
  ) {
    this.logger = deps.logger.child({ store: options.name })
  }

  get name(): string {
    return this.options.name
  }

  get isOpen(): boolean {
    return this.state.status === "open"
  }

  async init(context: StoreContext<K, V>): Promise<void> {
    const keyCodec = this.options.keyCodec ?? context.keyCodec
    const valueCodec = this.options.valueCodec ?? context.valueCodec

    if (!keyCodec || !valueCodec) {
      throw new TypeError(`Store ${this.name} has no ${keyCodec ? "value" : "key"} codec`)
    }

    const keys = createPartitionKeyCodec({
      keyCodec,
      keyPrefix: toBytes(this.options.keyPrefix),
      indexKeyTemplate: toBytes(this.options.indexKey),
    })
    const { client, retry } = this.deps

    if (!client.isOpen) {
      await retry.run("connect", () => client.connect())
    }

    const scripts = {
      put: await this.loadScript("put"),
      putIfAbsent: await this.loadScript("putIfAbsent"),
      delete: await this.loadScript("delete"),
    }

    this.logger = this.deps.logger.child({ store: this.name, partition: context.partition })
    this.state = {
      status: "open",
      partition: context.partition,
      keys,
      valueCodec,
      indexKey: keys.indexKey(context.partition),
      compare: this.options.compare ?? compareEncoded(keyCodec),
      scripts,
    }

    this.logger.info("Store opened")
  }

  async get(key: K): Promise<KvResult<V>> {
    const open = this.requireOpen()
    requireArgument(key, "key")

    const { prefixedKey } = open.keys.encodeKey(key, open.partition)
    const raw = await this.deps.retry.run("get", () => this.deps.client.get(prefixedKey))

    return this.toResult(open, raw)
  }

  put(key: K, value: V): void {
    const open = this.requireOpen()
    requireArgument(key, "key")
    requireArgument(value, "value")

    const { vanillaKey, prefixedKey } = open.keys.encodeKey(key, open.partition)
    const raw = encodeValue(open.valueCodec, value)

    this.dispatch("put", async () => {
      await this.evalScript(open, "put", [prefixedKey, open.indexKey], [raw, vanillaKey])
    })
  }

  async putIfAbsent(key: K, value: V): Promise<KvResult<V>> {
    const open = this.requireOpen()
    requireArgument(key, "key")
    requireArgument(value, "value")

    const { vanillaKey, prefixedKey } = open.keys.encodeKey(key, open.partition)
    const raw = encodeValue(open.valueCodec, value)
    const previous = await this.evalScript(
      open,
      "putIfAbsent",
      [prefixedKey, open.indexKey],
      [raw, vanillaKey],
    )

    return this.toResult(open, previous)
  }

  async delete(key: K): Promise<KvResult<V>> {
    const open = this.requireOpen()
    requireArgument(key, "key")

    const { vanillaKey, prefixedKey } = open.keys.encodeKey(key, open.partition)
    const removed = await this.evalScript(
      open,
      "delete",
      [prefixedKey, open.indexKey],
      [vanillaKey],
    )

    return this.toResult(open, removed)
  }

  putAll(entries: readonly KeyValueEntry<K, V>[]): void {
    const open = this.requireOpen()
    if (entries.length === 0) return

    const values: [Buffer, Buffer][] = []
    const members: Buffer[] = []

    for (const [key, value] of entries) {
      requireArgument(key, "key")
      requireArgument(value, "value")

      const { vanillaKey, prefixedKey } = open.keys.encodeKey(key, open.partition)
      values.push([prefixedKey, encodeValue(open.valueCodec, value)])
      members.push(vanillaKey)
    }

    const { client, retry } = this.deps

    this.dispatch("putAll", async () => {
      await retry.run("mset", () => client.mSet(values))
      await retry.run("sadd", () => client.sAdd(open.indexKey, members))
    })
  }

  range(from: K, to: K): KeyValueIterator<K, V> {
    const open = this.requireOpen()
    requireArgument(from, "key")
    requireArgument(to, "key")

    return this.scan(open, (key) => open.compare(from, key) <= 0 && open.compare(key, to) <= 0)
  }

  all(): KeyValueIterator<K, V> {
    return this.scan(this.requireOpen(), () => true)
  }

  async approximateNumEntries(): Promise<number> {
    const open = this.requireOpen()

    return this.deps.retry.run("scard", () => this.deps.client.sCard(open.indexKey))
  }

  async flush(): Promise<void> {
    this.requireOpen()

    const failure = await this.settle()
    if (failure) throw failure
  }

  /**
   * Closes the iterators still open, settles dispatched writes, then
   * disconnects. Rejects with the first write failure.
   */
  async close(): Promise<void> {
    if (this.state.status === "closed") return

    for (const iterator of this.iterators) iterator.close()

    const failure = await this.settle()

    this.state = { status: "closed" }
    if (this.deps.client.isOpen) await this.deps.client.quit()

    this.logger.info("Store closed")

    if (failure) throw failure
  }

  private scan(open: OpenState<K, V>, predicate: (key: K) => boolean): KeyValueIterator<K, V> {
    const iterator: KeyValueIterator<K, V> = startScan(
      {
        client: this.deps.client,
        keyCodec: open.keys,
        valueCodec: open.valueCodec,
        retry: this.deps.retry,
        logger: this.logger,
      },
      {
        partition: open.partition,
        pageSize: this.options.pageSize ?? DEFAULT_SCAN_PAGE_SIZE,
        predicate,
        onClose: () => this.iterators.delete(iterator),
      },
    )

    this.iterators.add(iterator)
    return iterator
  }

  private async loadScript(script: StoreScript): Promise<string> {
    const sha = await this.deps.retry.run("script_load", () =>
      this.deps.client.scriptLoad(STORE_SCRIPTS[script]),
    )

    return sha.toString()
  }

  /** Falls back to EVAL when the server lost the script, which caches it again. */
  private evalScript(
    open: OpenState<K, V>,
    script: StoreScript,
    keys: Buffer[],
    args: Buffer[],
  ): Promise<unknown> {
    const { client } = this.deps
    const call = { keys, arguments: args }

    return this.deps.retry.run(script, async () => {
      try {
        return await client.evalSha(open.scripts[script], call)
      } catch (error) {
        if (!isNoScriptError(error)) throw error

        this.logger.warn("Script missing on server, sending its body", { op: script })
        return await client.eval(STORE_SCRIPTS[script], call)
      }
    })
  }

  private dispatch(op: string, write: () => Promise<void>): void {
    const tracked: Promise<void> = write()
      .catch((error: unknown) => {
        this.logger.error(`Dispatched ${op} failed`, { op, err: error })
        this.writeFailures.push(writeFailed(op, error))
      })
      .finally(() => {
        this.pending.delete(tracked)
      })

    this.pending.add(tracked)
  }

  /** Waits for writes dispatched so far and for any they trigger; returns the first failure. */
  private async settle(): Promise<StoreError | undefined> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending)
    }

    const [first] = this.writeFailures.splice(0)
    return first
  }

  private toResult(open: OpenState<K, V>, raw: unknown): KvResult<V> {
    if (!(raw instanceof Uint8Array) || raw.byteLength === 0) return { kind: "not_found" }

    return { kind: "found", value: open.valueCodec.decode(raw) }
  }

  private requireOpen(): OpenState<K, V> {
    if (this.state.status === "closed") throw storeNotOpen(this.name)

    return this.state
  }
}

function requireArgument(value: unknown, argument: "key" | "value"): void {
  if (value === null || value === undefined) throw nullArgument(argument)
}

function encodeValue<V>(codec: Codec<V>, value: V): Buffer {
  const raw = Buffer.from(codec.encode(value))
  if (raw.byteLength === 0) throw emptyValue()

  return raw
}

function toBytes(value: string | Uint8Array): Buffer {
  return typeof value === "string" ? Buffer.from(value, "utf8") : Buffer.from(value)
}

function compareEncoded<K>(codec: Codec<K>): (a: K, b: K) => number {
  return (a, b) => Buffer.compare(codec.encode(a), codec.encode(b))
}
