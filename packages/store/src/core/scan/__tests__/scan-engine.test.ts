import { FakeClock } from "@shardkv/clock"
import { createNullLogger, type Logger } from "@shardkv/logger"
import { createTestRetry, drain } from "../../../tests/utils/create-test-store"
import { MemoryRedisClient, type MemoryRedisOptions } from "../../../tests/utils/memory-redis-client"
import { RecordingLogger } from "../../../tests/utils/recording-logger"
import { tick } from "../../../tests/utils/tick"
import { createPartitionKeyCodec } from "../../codec/partition-key-codec"
import { int32Codec, utf8Codec } from "../../codec/value-codecs"
import { startScan } from "../scan-engine"

const PARTITION = 7

const keyCodec = createPartitionKeyCodec({
  keyCodec: int32Codec,
  keyPrefix: Buffer.from("kv:"),
  indexKeyTemplate: Buffer.from("kv:index:"),
})

async function setup(options: { entries?: number; redis?: MemoryRedisOptions; logger?: Logger } = {}) {
  const client = new MemoryRedisClient(options.redis)
  const clock = new FakeClock()
  const logger = options.logger ?? createNullLogger()

  await client.connect()
  for (let k = 0; k < (options.entries ?? 0); k++) seed(client, k, `v${k}`)

  const scan = (
    pageSize: number,
    predicate: (key: number) => boolean = () => true,
    onClose?: () => void,
  ) =>
    startScan(
      { client, keyCodec, valueCodec: utf8Codec, retry: createTestRetry(clock, logger), logger },
      { partition: PARTITION, pageSize, predicate, ...(onClose && { onClose }) },
    )

  return { client, clock, scan }
}

function seed(client: MemoryRedisClient, key: number, value: string): void {
  const { vanillaKey, prefixedKey } = keyCodec.encodeKey(key, PARTITION)

  client.rawSet(prefixedKey, Buffer.from(value))
  client.rawAddMember(keyCodec.indexKey(PARTITION), vanillaKey)
}

function expected(keys: number[]): [number, string][] {
  return keys.map((k) => [k, `v${k}`])
}

describe("startScan", () => {
  it("walks the whole index one page at a time", async () => {
    const { client, scan } = await setup({ entries: 10 })

    const entries = await drain(scan(3))

    expect(entries).toEqual(expected([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]))
    expect(client.count("SSCAN")).toBe(4)
    expect(client.count("MGET")).toBe(4)
  })

  it("ends at once for an empty partition", async () => {
    const { client, scan } = await setup()

    const iterator = scan(5)

    await expect(iterator.hasNext()).resolves.toBe(false)
    expect(client.count("SSCAN")).toBe(1)
    expect(client.count("MGET")).toBe(0)
  })

  it("keeps scanning past pages the predicate filters out entirely", async () => {
    const { client, scan } = await setup({ entries: 10 })

    const entries = await drain(scan(5, (k) => k >= 7))

    expect(entries).toEqual(expected([7, 8, 9]))
    expect(client.count("SSCAN")).toBe(2)
    expect(client.count("MGET")).toBe(1)
  })

  it("reports a member returned on two pages once", async () => {
    const { scan } = await setup({ entries: 8, redis: { scanOverlap: 1 } })

    const entries = await drain(scan(3))

    expect(entries).toEqual(expected([0, 1, 2, 3, 4, 5, 6, 7]))
  })

  it("skips index members whose value is gone", async () => {
    const { client, scan } = await setup({ entries: 3 })
    client.rawDelete(keyCodec.encodeKey(1, PARTITION).prefixedKey)

    const entries = await drain(scan(10))

    expect(entries).toEqual(expected([0, 2]))
  })

  it("skips empty values", async () => {
    const { client, scan } = await setup({ entries: 2 })
    client.rawSet(keyCodec.encodeKey(0, PARTITION).prefixedKey, Buffer.alloc(0))

    await expect(drain(scan(10))).resolves.toEqual(expected([1]))
  })

  it("retries a failed MGET and carries on", async () => {
    const { client, clock, scan } = await setup({ entries: 4 })
    client.failNext("MGET", 2)

    const entries = await drain(scan(10))

    expect(entries).toEqual(expected([0, 1, 2, 3]))
    expect(client.count("MGET")).toBe(3)
    expect(clock.sleeps).toEqual([10, 20])
  })

  it("fails the iterator once SSCAN retries are exhausted", async () => {
    const cause = new Error("SSCAN connection reset")
    const { client, scan } = await setup({ entries: 4 })
    client.failNext("SSCAN", 10, cause)

    const iterator = scan(10)

    await expect(iterator.hasNext()).rejects.toMatchObject({
      code: "scan_failed",
      cause: {
        code: "retries_exhausted",
        context: { op: "sscan", attempts: 4, elapsedMs: 70, timedOut: false },
        cause,
      },
    })
    await expect(iterator.hasNext()).resolves.toBe(false)
  })

  it("delivers entries read before a later page fails", async () => {
    const { client, scan } = await setup({ entries: 4 })
    const iterator = scan(2)

    await expect(iterator.next()).resolves.toEqual({ key: 0, value: "v0" })
    client.failNext("SSCAN", 10)

    await expect(iterator.next()).resolves.toEqual({ key: 1, value: "v1" })
    await expect(iterator.hasNext()).rejects.toMatchObject({ code: "scan_failed" })
  })

  it("stops issuing commands once the iterator is closed", async () => {
    const logger = new RecordingLogger()
    const { client, scan } = await setup({ entries: 20, logger })
    const iterator = scan(2)

    await expect(iterator.next()).resolves.toEqual({ key: 0, value: "v0" })
    iterator.close()
    await tick(5)
    const issued = client.commands.length
    await tick(5)

    expect(client.commands.length).toBe(issued)
    expect(client.count("SSCAN")).toBeLessThan(10)
    expect(logger.messages("debug")).toContain("Scan stopped by iterator close")
    await expect(iterator.hasNext()).resolves.toBe(false)
  })

  it("abandons the page in flight when closed during SSCAN", async () => {
    const logger = new RecordingLogger()
    const { client, scan } = await setup({ entries: 4, logger })
    const release = client.pause("SSCAN")

    const iterator = scan(10)
    await tick()
    iterator.close()
    release()
    await tick(3)

    expect(client.count("SSCAN")).toBe(1)
    expect(client.count("MGET")).toBe(0)
    expect(logger.messages("debug")).toEqual(["Retry cancelled", "Scan stopped by iterator close"])
  })

  it("tells the caller when the iterator is closed", async () => {
    const { scan } = await setup({ entries: 2 })
    const onClose = vi.fn()

    const iterator = scan(10, () => true, onClose)
    await drain(iterator)
    expect(onClose).not.toHaveBeenCalled()

    iterator.close()
    expect(onClose).toHaveBeenCalledTimes(1)
  })

  it("rejects a page size below one", async () => {
    const { scan } = await setup()

    expect(() => scan(0)).toThrow(RangeError)
  })
})
