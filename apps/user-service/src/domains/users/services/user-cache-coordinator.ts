import type { CacheKey, CacheTtl, StringCache } from "@usercache/cache"
import type { Milliseconds } from "@usercache/clock"
import type { Logger } from "@usercache/logger"
import { withTimeout } from "../../../lib/with-timeout"
import { UserError } from "../model/user.errors"
import type { NewUser, UserDraft, UserRecord } from "../model/user.model"
import type { MutationResult, UserStore } from "../model/user-store"

/**
 * What a failed cache write on the read-miss path does to the request.
 * `fail` turns it into a 500; `serve` logs it and returns the fresh payload.
 */
export type CacheFillFailurePolicy = "fail" | "serve"

export type UsersSnapshot = {
  source: "cache" | "store"
  /** JSON array of every user, exactly as cached. */
  payload: string
}

export type UserCacheCoordinatorDeps = {
  store: UserStore
  cache: StringCache
  logger: Logger
}

export type UserCacheCoordinatorOptions = {
  cacheKey: CacheKey
  /** TTL applied when a read miss fills the cache. */
  readTtl: CacheTtl
  /** TTL applied when a write refreshes the cache. */
  refreshTtl: CacheTtl
  /** Bound on every single store or cache call. */
  operationTimeoutMs: Milliseconds
  cacheFillFailure: CacheFillFailurePolicy
}

type WriteKind = "create" | "update" | "delete"

/**
 * Cache-aside over the whole user collection, held as one JSON snapshot.
 *
 * Reads try the cache and fall back to the store, filling the cache on a
 * miss. Writes go to the store, then synchronously re-query it and overwrite
 * the snapshot; a failed refresh is logged and the write still succeeds.
 *
 * Nothing orders refreshes across concurrent writes. When two refreshes
 * finish out of order the cache keeps whichever landed last, which may be
 * the older snapshot until the entry expires.
 */
export class UserCacheCoordinator {
  constructor(
    private readonly deps: UserCacheCoordinatorDeps,
    private readonly opts: UserCacheCoordinatorOptions,
  ) {}

  async listUsers(): Promise<UsersSnapshot> {
    const cached = await this.probeCache()

    if (cached !== undefined) return { source: "cache", payload: cached }

    const payload = await this.loadSnapshot()

    await this.fillCache(payload)

    return { source: "store", payload }
  }

  async createUser(draft: UserDraft): Promise<void> {
    const user = requireUser(draft)

    await this.write("create", () => this.deps.store.insert(user))
  }

  async updateUser(draft: UserDraft): Promise<void> {
    const user = requireUser(draft)

    await this.write("update", () => this.deps.store.updateEmail(user))
  }

  async deleteUser(username: string | undefined): Promise<void> {
    if (!isPresent(username)) throw UserError.missingField("username")

    await this.write("delete", () => this.deps.store.deleteByUsername(username))
  }

  private async write(
    kind: WriteKind,
    mutate: () => Promise<MutationResult>,
  ): Promise<void> {
    const { affectedRows } = await this.timed(`store.${kind}`, mutate)

    this.deps.logger.debug("User write applied", { kind, affectedRows })

    await this.refresh(kind)
  }

  /** A probe error or timeout reads as a miss. */
  private async probeCache(): Promise<string | undefined> {
    try {
      const result = await this.timed(
        "cache.get",
        () => this.deps.cache.get(this.opts.cacheKey),
      )

      return result.kind === "hit" ? result.value : undefined
    } catch (err) {
      this.deps.logger.warn("Users cache probe failed, reading from store", {
        err,
        cacheKey: this.opts.cacheKey,
      })

      return undefined
    }
  }

  private async fillCache(payload: string): Promise<void> {
    try {
      await this.timed("cache.set", () =>
        this.deps.cache.set(this.opts.cacheKey, payload, {
          ttl: this.opts.readTtl,
        }),
      )
    } catch (err) {
      if (this.opts.cacheFillFailure === "fail") throw err

      this.deps.logger.warn(
        "Users cache fill failed, serving uncached snapshot",
        { err, cacheKey: this.opts.cacheKey },
      )
    }
  }

  private async refresh(after: WriteKind): Promise<void> {
    try {
      const payload = await this.loadSnapshot()

      await this.timed("cache.set", () =>
        this.deps.cache.set(this.opts.cacheKey, payload, {
          ttl: this.opts.refreshTtl,
        }),
      )
    } catch (err) {
      this.deps.logger.error("Users cache refresh failed", {
        err,
        after,
        cacheKey: this.opts.cacheKey,
      })
    }
  }

  private async loadSnapshot(): Promise<string> {
    const users = await this.timed(
      "store.findAll",
      () => this.deps.store.findAll(),
    )

    return serialize(users)
  }

  private timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withTimeout(operation, this.opts.operationTimeoutMs, fn)
  }
}

function serialize(users: UserRecord[]): string {
  try {
    return JSON.stringify(users)
  } catch (err) {
    throw UserError.serializationFailed(err)
  }
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value !== ""
}

function requireUser(draft: UserDraft): NewUser {
  if (!isPresent(draft.username)) throw UserError.missingField("username")
  if (!isPresent(draft.email)) throw UserError.missingField("email")

  return { username: draft.username, email: draft.email }
}
