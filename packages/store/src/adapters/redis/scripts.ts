/**
 * Server-side operations that change a value and its partition index
 * membership together.
 *
 * KEYS[1] = prefixed value key, KEYS[2] = partition index key.
 */

/** ARGV[1] = value, ARGV[2] = vanilla key. Returns OK. */
export const PUT_SCRIPT = `
redis.call('SET', KEYS[1], ARGV[1])
redis.call('SADD', KEYS[2], ARGV[2])
return redis.status_reply('OK')
`

/** ARGV[1] = value, ARGV[2] = vanilla key. Returns the existing value or nil. */
export const PUT_IF_ABSENT_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if current then
  return current
end

redis.call('SET', KEYS[1], ARGV[1])
redis.call('SADD', KEYS[2], ARGV[2])
return false
`

/** ARGV[1] = vanilla key. Returns the removed value or nil. */
export const DELETE_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if current then
  redis.call('DEL', KEYS[1])
end

redis.call('SREM', KEYS[2], ARGV[1])
return current
`

export type StoreScript = "put" | "putIfAbsent" | "delete"

export const STORE_SCRIPTS: Readonly<Record<StoreScript, string>> = {
  put: PUT_SCRIPT,
  putIfAbsent: PUT_IF_ABSENT_SCRIPT,
  delete: DELETE_SCRIPT,
}

export function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.startsWith("NOSCRIPT")
}
