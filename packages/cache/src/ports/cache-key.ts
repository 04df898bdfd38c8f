/**
 * Plain string key. Adapters prepend their {@link KeyspacePrefix}.
 *
 * @example
 * ```ts
 * const key: CacheKey = "users"
 * ```
 */
export type CacheKey = string
