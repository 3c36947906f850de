import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"

export type ScriptCall = {
  keys: Buffer[]
  arguments: Buffer[]
}

/**
 * The slice of a node-redis client the store uses, with bulk strings mapped
 * to `Buffer` so binary keys and values pass through untouched.
 */
export type RedisStoreClient = {
  get(key: Buffer): Promise<Buffer | null>
  mGet(keys: Buffer[]): Promise<(Buffer | null)[]>
  mSet(entries: [Buffer, Buffer][]): Promise<unknown>

  sAdd(key: Buffer, members: Buffer[]): Promise<number>
  sCard(key: Buffer): Promise<number>

  /** `cursor` "0" starts a scan; a returned "0" means the scan is finished. */
  sScan(
    key: Buffer,
    cursor: string,
    opts?: { COUNT?: number },
  ): Promise<{ cursor: string | Buffer; members: Buffer[] }>

  scriptLoad(script: string): Promise<string | Buffer>
  evalSha(sha: string, opts: ScriptCall): Promise<unknown>
  eval(script: string, opts: ScriptCall): Promise<unknown>

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean
}

export type RedisStoreClientOptions = { url: string } & Omit<RedisClientOptions, "url">

export function createRedisClient(options: RedisStoreClientOptions): RedisStoreClient {
  return createClient({ ...options, url: options.url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisStoreClient
}
