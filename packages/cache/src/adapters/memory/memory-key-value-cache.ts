import type { Clock, UnixMs } from "@usercache/clock"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import { FifoMemoryMap } from "../../core/eviction/fifo-memory-map"
import { WrongTypeError } from "../../core/wrong-type-error"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { KeyValueCache } from "../../ports/key-value-cache"

export type MemoryCacheOptions = {
  /**
   * Maximum number of keys retained. Past it, the oldest inserted key is
   * evicted whatever its kind.
   */
  maxEntries: number
}

export type MemoryCacheEntry =
  | { kind: "string"; value: string; expiresAtMs?: UnixMs }
  | { kind: "list"; values: string[] }
  | { kind: "hash"; fields: Map<string, string> }

export type MemoryCacheDeps = {
  clock: Clock
  /** @default a FifoMemoryMap */
  store?: EvictionMap<CacheKey, MemoryCacheEntry>
}

/**
 * In-process {@link KeyValueCache}. String TTLs follow the injected clock;
 * lists and hashes never expire.
 */
export class MemoryKeyValueCache implements KeyValueCache {
  private readonly store: EvictionMap<CacheKey, MemoryCacheEntry>

  public constructor(
    private readonly deps: MemoryCacheDeps,
    private readonly opts: MemoryCacheOptions,
  ) {
    if (opts.maxEntries < 1) {
      throw new RangeError(
        `maxEntries must be at least 1, got ${opts.maxEntries}`,
      )
    }

    this.store = deps.store ?? new FifoMemoryMap()
  }

  async get(key: CacheKey): Promise<CacheResult<string>> {
    const entry = this.live(key)

    if (entry === undefined) return { kind: "miss" }
    if (entry.kind !== "string") {
      throw new WrongTypeError(key, "string", entry.kind)
    }

    return { kind: "hit", value: entry.value }
  }

  async set(
    key: CacheKey,
    value: string,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    if (opts?.ttl) {
      this.put(key, {
        kind: "string",
        value,
        expiresAtMs: this.toExpiresAtMs(opts.ttl),
      })
    } else {
      this.put(key, { kind: "string", value })
    }
  }

  async pushList(key: CacheKey, values: readonly string[]): Promise<number> {
    const entry = this.live(key)

    if (entry === undefined) {
      this.put(key, { kind: "list", values: [...values] })

      return values.length
    }

    if (entry.kind !== "list") throw new WrongTypeError(key, "list", entry.kind)

    entry.values.push(...values)

    return entry.values.length
  }

  async rangeList(key: CacheKey): Promise<string[]> {
    const entry = this.live(key)

    if (entry === undefined) return []
    if (entry.kind !== "list") throw new WrongTypeError(key, "list", entry.kind)

    return [...entry.values]
  }

  async setHashField(
    key: CacheKey,
    field: string,
    value: string,
  ): Promise<void> {
    const entry = this.live(key)

    if (entry === undefined) {
      this.put(key, { kind: "hash", fields: new Map([[field, value]]) })

      return
    }

    if (entry.kind !== "hash") throw new WrongTypeError(key, "hash", entry.kind)

    entry.fields.set(field, value)
  }

  async getHashField(
    key: CacheKey,
    field: string,
  ): Promise<CacheResult<string>> {
    const entry = this.live(key)

    if (entry === undefined) return { kind: "miss" }
    if (entry.kind !== "hash") throw new WrongTypeError(key, "hash", entry.kind)

    const value = entry.fields.get(field)

    return value === undefined ? { kind: "miss" } : { kind: "hit", value }
  }

  /** Reads an entry, dropping it first when its TTL has passed. */
  private live(key: CacheKey): MemoryCacheEntry | undefined {
    const entry = this.store.get(key)

    if (entry === undefined) return undefined

    if (this.isExpired(entry)) {
      this.store.delete(key)

      return undefined
    }

    return entry
  }

  private put(key: CacheKey, entry: MemoryCacheEntry): void {
    if (!this.store.has(key)) this.makeRoom()

    this.store.set(key, entry)
  }

  private makeRoom(): void {
    while (this.store.size() >= this.opts.maxEntries) {
      const victim = this.store.victim()

      if (victim === undefined) {
        throw new Error(
          "Invariant violation: EvictionMap.victim() returned undefined while full",
        )
      }

      this.store.delete(victim)
    }
  }

  private isExpired(entry: MemoryCacheEntry): boolean {
    if (entry.kind !== "string" || entry.expiresAtMs === undefined) return false

    return entry.expiresAtMs <= this.deps.clock.nowMs()
  }

  private toExpiresAtMs(ttl: CacheTtl): UnixMs {
    const now = this.deps.clock.nowMs()

    if (ttl.kind === "seconds") return now + ttl.seconds * 1000
    if (ttl.kind === "milliseconds") return now + ttl.milliseconds

    return ttl.expiresAt.getTime()
  }
}
