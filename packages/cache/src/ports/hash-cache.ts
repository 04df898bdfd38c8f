import type { CacheKey } from "./cache-key"
import type { CacheResult } from "./cache-result"

export interface HashCache {
  setHashField(key: CacheKey, field: string, value: string): Promise<void>

  getHashField(key: CacheKey, field: string): Promise<CacheResult<string>>
}
