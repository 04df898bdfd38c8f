import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * String values under plain keys.
 *
 * @remarks
 * Cached values are derived data. They may be evicted or stale at any time,
 * and a miss says nothing about the source of truth.
 */
export interface StringCache {
  get(key: CacheKey): Promise<CacheResult<string>>

  /** Overwrites whatever the key held, including a value of another kind. */
  set(
    key: CacheKey,
    value: string,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void>
}
