/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     REDIS_URL: z.string().default("redis://localhost:6379"),
 *     STORE_SCAN_BATCH_SIZE: z.coerce.number().int().positive().default(50),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("STORE_SCAN_BATCH_SIZE") // 50
 * config.explain("REDIS_URL")         // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`
   * ("env", "dotenv:.env", "object:overrides"), or "default" when the schema
   * filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value, "default" included. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   * Usually typos or stale settings.
   */
  unknownKeys(): string[]
}
