export {
  type MemoryCacheDeps,
  type MemoryCacheEntry,
  type MemoryCacheOptions,
  MemoryKeyValueCache,
} from "./adapters/memory/memory-key-value-cache"
export {
  createRedisClient,
  pingRedis,
  type RedisClientOptions,
  type RedisSetOptions,
  type RedisStringClient,
} from "./adapters/redis/redis-client"
export { RedisKeyValueCache } from "./adapters/redis/redis-key-value-cache"
export type { EvictionMap } from "./core/eviction/eviction-map"
export { FifoMemoryMap } from "./core/eviction/fifo-memory-map"
export { type CacheValueKind, WrongTypeError } from "./core/wrong-type-error"
export type { CacheKey } from "./ports/cache-key"
export type { CacheSetOptions, CacheTtl } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { HashCache } from "./ports/hash-cache"
export type { KeyValueCache } from "./ports/key-value-cache"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
export type { ListCache } from "./ports/list-cache"
export type { StringCache } from "./ports/string-cache"
