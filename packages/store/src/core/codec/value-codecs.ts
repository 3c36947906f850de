import superjson from "superjson"
import type { Codec } from "../../ports/codec"

const decoder = new TextDecoder("utf-8", { fatal: true })

/** JSON via superjson, so `Date`, `Map`, `Set` and `bigint` survive a round trip. */
export function createJsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => Buffer.from(superjson.stringify(value), "utf8"),
    decode: (data: Uint8Array) => superjson.parse<T>(decoder.decode(data)),
  }
}

export const utf8Codec: Codec<string> = {
  encode: (value) => Buffer.from(value, "utf8"),
  decode: (data) => decoder.decode(data),
}

/** Big-endian two's complement, four bytes. */
export const int32Codec: Codec<number> = {
  encode(value) {
    if (!Number.isInteger(value) || value < -0x8000_0000 || value > 0x7fff_ffff) {
      throw new RangeError(`Not an int32: ${value}`)
    }

    const out = Buffer.alloc(4)
    out.writeInt32BE(value)
    return out
  },

  decode(data) {
    if (data.byteLength !== 4) {
      throw new RangeError(`int32 needs 4 bytes (got ${data.byteLength})`)
    }

    return Buffer.from(data.buffer, data.byteOffset, data.byteLength).readInt32BE()
  },
}
