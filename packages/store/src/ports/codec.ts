/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Codecs sit at the boundary between the typed store API and the raw bytes the
 * Redis adapter writes. They should be pure, deterministic transforms.
 *
 * Keys are encoded with a codec too, so a key codec must be injective: two
 * distinct keys may never encode to the same bytes.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
