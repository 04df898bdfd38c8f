/**
 * Map-like storage that owns an eviction order. Used by the in-memory
 * adapter only.
 */
export interface EvictionMap<K, V> {
  get(key: K): V | undefined
  set(key: K, value: V): void
  delete(key: K): boolean
  has(key: K): boolean
  size(): number

  /** Next key to evict, or `undefined` when empty. */
  victim(): K | undefined
}
