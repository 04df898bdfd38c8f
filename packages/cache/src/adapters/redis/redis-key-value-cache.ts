import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { KeyValueCache } from "../../ports/key-value-cache"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { RedisSetOptions, RedisStringClient } from "./redis-client"

type RedisKeyValueCacheOptions = {
  keyspacePrefix: KeyspacePrefix
}

export class RedisKeyValueCache implements KeyValueCache {
  public constructor(
    private readonly client: RedisStringClient,
    private readonly opts: RedisKeyValueCacheOptions,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<string>> {
    return this.createCacheResult(await this.client.get(this.fullKey(key)))
  }

  async set(
    key: CacheKey,
    value: string,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    const fullKey = this.fullKey(key)

    if (opts?.ttl) {
      await this.client.set(fullKey, value, this.toRedisTtl(opts.ttl))
    } else {
      await this.client.set(fullKey, value)
    }
  }

  async pushList(key: CacheKey, values: readonly string[]): Promise<number> {
    return this.client.rPush(this.fullKey(key), [...values])
  }

  async rangeList(key: CacheKey): Promise<string[]> {
    return this.client.lRange(this.fullKey(key), 0, -1)
  }

  async setHashField(
    key: CacheKey,
    field: string,
    value: string,
  ): Promise<void> {
    await this.client.hSet(this.fullKey(key), field, value)
  }

  async getHashField(
    key: CacheKey,
    field: string,
  ): Promise<CacheResult<string>> {
    return this.createCacheResult(
      await this.client.hGet(this.fullKey(key), field),
    )
  }

  private createCacheResult(value: string | null): CacheResult<string> {
    if (value === null) return { kind: "miss" }

    return { kind: "hit", value }
  }

  private toRedisTtl(ttl: CacheTtl): RedisSetOptions {
    if (ttl.kind === "seconds") return { EX: ttl.seconds }
    if (ttl.kind === "milliseconds") return { PX: ttl.milliseconds }

    return { PXAT: ttl.expiresAt.getTime() }
  }

  private fullKey(key: CacheKey): string {
    return `${this.opts.keyspacePrefix}${key}`
  }
}
