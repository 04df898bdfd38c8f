import type { CacheKey } from "./cache-key"

export interface ListCache {
  /**
   * Appends to the tail of the list, creating it when absent.
   *
   * @returns the list length after the push
   */
  pushList(key: CacheKey, values: readonly string[]): Promise<number>

  /** The whole list, head first. An absent key reads as `[]`. */
  rangeList(key: CacheKey): Promise<string[]>
}
