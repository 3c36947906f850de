export type KvFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type KvNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a point read.
 *
 * @remarks
 * A zero-length stored value is reported as `not_found`; values are never
 * empty on the wire.
 */
export type KvResult<T> = KvFound<T> | KvNotFound
