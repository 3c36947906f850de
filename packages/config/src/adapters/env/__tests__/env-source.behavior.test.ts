import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns all env vars when no prefix", async () => {
    const source = new EnvSource({ env: { REDIS_URL: "redis://cache:6379", STORE_NAME: "orders" } })

    expect(await source.load()).toEqual({
      REDIS_URL: "redis://cache:6379",
      STORE_NAME: "orders",
    })
  })

  it("filters and strips prefix when provided", async () => {
    const env = {
      ORDERS_STORE_NAME: "orders",
      ORDERS_REDIS_URL: "redis://cache:6379",
      PATH: "/usr/bin",
    }

    const source = new EnvSource({ env, prefix: "ORDERS_" })

    expect(await source.load()).toEqual({
      STORE_NAME: "orders",
      REDIS_URL: "redis://cache:6379",
    })
  })

  it("returns a copy of the injected env", async () => {
    const env: Record<string, string | undefined> = { STORE_NAME: "orders" }
    const source = new EnvSource({ env })

    const loaded = await source.load()
    loaded.STORE_NAME = "changed"

    expect(env.STORE_NAME).toBe("orders")
  })
})
