import type { KeyValueCache } from "@usercache/cache"
import type { Milliseconds } from "@usercache/clock"
import { withTimeout } from "../../../lib/with-timeout"
import { KeyValueError } from "../model/kv.errors"

export type KeyValuePassthroughDeps = {
  cache: KeyValueCache
}

export type KeyValuePassthroughOptions = {
  operationTimeoutMs: Milliseconds
}

const MISSING_KEY = "Missing key parameter"
const MISSING_KEY_OR_VALUE = "Missing key or value parameters"
const MISSING_KEY_OR_FIELD = "Missing key or field parameter"
const MISSING_KEY_FIELD_OR_VALUE = "Missing key, field, or value parameters"

/**
 * Direct string, list and hash access to the cache, with no relation to the
 * users snapshot. Nothing written here expires.
 */
export class KeyValuePassthrough {
  constructor(
    private readonly deps: KeyValuePassthroughDeps,
    private readonly opts: KeyValuePassthroughOptions,
  ) {}

  async setString(
    key: string | undefined,
    value: string | undefined,
  ): Promise<void> {
    if (!isPresent(key) || !isPresent(value)) {
      throw KeyValueError.missingParameters(MISSING_KEY_OR_VALUE, [
        "key",
        "value",
      ])
    }

    await this.timed("cache.set", () => this.deps.cache.set(key, value))
  }

  async getString(key: string | undefined): Promise<string> {
    if (!isPresent(key)) {
      throw KeyValueError.missingParameters(MISSING_KEY, ["key"])
    }

    const result = await this.timed("cache.get", () => this.deps.cache.get(key))

    if (result.kind === "miss") throw KeyValueError.keyNotFound(key)

    return result.value
  }

  /** Appends; an existing list keeps its items. Returns the new length. */
  async pushList(
    key: string | undefined,
    values: readonly string[],
  ): Promise<number> {
    if (!isPresent(key) || values.length === 0) {
      throw KeyValueError.missingParameters(MISSING_KEY_OR_VALUE, [
        "key",
        "value",
      ])
    }

    return this.timed(
      "cache.pushList",
      () => this.deps.cache.pushList(key, values),
    )
  }

  /** A missing list reads as empty. */
  async rangeList(key: string | undefined): Promise<string[]> {
    if (!isPresent(key)) {
      throw KeyValueError.missingParameters(MISSING_KEY, ["key"])
    }

    return this.timed("cache.rangeList", () => this.deps.cache.rangeList(key))
  }

  async setHashField(
    key: string | undefined,
    field: string | undefined,
    value: string | undefined,
  ): Promise<void> {
    if (!isPresent(key) || !isPresent(field) || !isPresent(value)) {
      throw KeyValueError.missingParameters(MISSING_KEY_FIELD_OR_VALUE, [
        "key",
        "field",
        "value",
      ])
    }

    await this.timed(
      "cache.setHashField",
      () => this.deps.cache.setHashField(key, field, value),
    )
  }

  async getHashField(
    key: string | undefined,
    field: string | undefined,
  ): Promise<string> {
    if (!isPresent(key) || !isPresent(field)) {
      throw KeyValueError.missingParameters(MISSING_KEY_OR_FIELD, [
        "key",
        "field",
      ])
    }

    const result = await this.timed("cache.getHashField", () =>
      this.deps.cache.getHashField(key, field),
    )

    if (result.kind === "miss") throw KeyValueError.fieldNotFound(key, field)

    return result.value
  }

  private timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withTimeout(operation, this.opts.operationTimeoutMs, fn)
  }
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value !== ""
}
