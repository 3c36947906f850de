export type KeyValue<K, V> = {
  readonly key: K
  readonly value: V
}
