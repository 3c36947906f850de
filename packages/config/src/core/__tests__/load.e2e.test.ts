import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { z } from "zod"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigValidationError } from "../config-error"
import { loadConfig } from "../load"

const schema = z.object({
  REDIS_URL: z.string().default("redis://localhost:6379"),
  STORE_SCAN_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  STORE_NAME: z.string(),
})

describe("loadConfig e2e", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-e2e-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("coerces and defaults values from a single source", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { STORE_NAME: "orders", STORE_SCAN_BATCH_SIZE: "10" } })],
    })

    expect(config.value).toEqual({
      REDIS_URL: "redis://localhost:6379",
      STORE_SCAN_BATCH_SIZE: 10,
      STORE_NAME: "orders",
    })
  })

  it("applies sources in order: dotenv < env < overrides", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "STORE_NAME=from-dotenv\nREDIS_URL=redis://dotenv:6379\nSTORE_SCAN_BATCH_SIZE=5",
    )

    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ env: { STORE_NAME: "from-env", REDIS_URL: "redis://env:6379" } }),
        new ObjectSource({ STORE_NAME: "from-overrides" }),
      ],
    })

    expect(config.get("STORE_NAME")).toBe("from-overrides")
    expect(config.get("REDIS_URL")).toBe("redis://env:6379")
    expect(config.get("STORE_SCAN_BATCH_SIZE")).toBe(5)
    expect(config.explain("STORE_NAME")).toBe("object:overrides")
    expect(config.explain("REDIS_URL")).toBe("env")
    expect(config.explain("STORE_SCAN_BATCH_SIZE")).toBe("dotenv:.env")
  })

  it("undefined values do not override defined values", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { STORE_NAME: "orders" } }),
        new EnvSource({ env: { STORE_NAME: undefined } }),
      ],
    })

    expect(config.get("STORE_NAME")).toBe("orders")
  })

  it("skips missing optional dotenv files", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env.missing", required: false, cwd }),
        new EnvSource({ env: { STORE_NAME: "orders" } }),
      ],
    })

    expect(config.sourcesUsed()).toEqual(["default", "env"])
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { STORE_NAME: "orders", STORE_NMAE: "typo" } })],
    })

    expect(config.unknownKeys()).toEqual(["STORE_NMAE"])
  })

  it("throws ConfigValidationError naming the failing key", async () => {
    const load = loadConfig({
      schema,
      sources: [new EnvSource({ env: { STORE_NAME: "orders", STORE_SCAN_BATCH_SIZE: "zero" } })],
    })

    await expect(load).rejects.toBeInstanceOf(ConfigValidationError)
    await expect(load).rejects.toThrow(/STORE_SCAN_BATCH_SIZE/)
  })

  it("loads from process.env by default", async () => {
    const original = process.env.STORE_NAME
    process.env.STORE_NAME = "from-process"

    try {
      const config = await loadConfig({ schema })

      expect(config.get("STORE_NAME")).toBe("from-process")
    } finally {
      if (original === undefined) {
        delete process.env.STORE_NAME
      } else {
        process.env.STORE_NAME = original
      }
    }
  })
})
