import { FakeClock } from "@shardkv/clock"
import { MemoryRedisClient } from "../../tests/utils/memory-redis-client"
import { RecordingLogger } from "../../tests/utils/recording-logger"
import { drain } from "../../tests/utils/create-test-store"
import { int32Codec, utf8Codec } from "../codec/value-codecs"
import { loadStoreConfig } from "../config/store-config"
import { createRedisPartitionedStore } from "../create-store"

describe("createRedisPartitionedStore", () => {
  async function setup() {
    const config = await loadStoreConfig({
      env: {
        STORE_NAME: "orders",
        STORE_KEY_PREFIX: "o:",
        STORE_INDEX_KEY: "o:index:",
        STORE_SCAN_BATCH_SIZE: "2",
        STORE_RETRY_INITIAL_MS: "5",
        STORE_RETRY_MAX_MS: "20",
        STORE_RETRY_MAX_ATTEMPTS: "3",
      },
    })
    const client = new MemoryRedisClient()
    const clock = new FakeClock()
    const logger = new RecordingLogger()
    const store = createRedisPartitionedStore(
      config,
      { keyCodec: int32Codec, valueCodec: utf8Codec },
      { client, clock, logger },
    )

    return { store, client, clock, logger }
  }

  it("names the store and uses the configured key layout", async () => {
    const { store, client } = await setup()
    await store.init({ partition: 1 })

    store.put(4, "four")
    await store.flush()

    expect(store.name).toBe("orders")
    expect(client.rawGet(Buffer.from([...Buffer.from("o:"), 0, 0, 0, 1, 0, 0, 0, 4]))).toEqual(
      Buffer.from("four"),
    )
    expect(client.rawMembers(Buffer.from([...Buffer.from("o:index:"), 0, 0, 0, 1]))).toEqual([
      Buffer.from([0, 0, 0, 4]),
    ])
  })

  it("retries with the configured policy", async () => {
    const { store, client, clock } = await setup()
    await store.init({ partition: 1 })
    client.failNext("GET", 5)

    await expect(store.get(4)).rejects.toMatchObject({
      code: "retries_exhausted",
      context: { op: "get", attempts: 3 },
    })
    expect(clock.sleeps).toEqual([5, 10])
  })

  it("logs through the given logger", async () => {
    const { store, logger } = await setup()

    await store.init({ partition: 1 })

    expect(logger.messages("info")).toEqual(["Store opened"])
  })

  it("scans with the configured page size", async () => {
    const { store, client } = await setup()
    await store.init({ partition: 1 })
    store.putAll([
      [1, "a"],
      [2, "b"],
      [3, "c"],
    ])
    await store.flush()

    await expect(drain(store.all())).resolves.toEqual([
      [1, "a"],
      [2, "b"],
      [3, "c"],
    ])
    expect(client.count("SSCAN")).toBe(2)
  })
})
