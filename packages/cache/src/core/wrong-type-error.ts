import { BaseError } from "@usercache/errors"
import type { CacheKey } from "../ports/cache-key"

export type CacheValueKind = "string" | "list" | "hash"

/** A key was used as one kind of value while it holds another. */
export class WrongTypeError extends BaseError<"cache_wrong_type"> {
  constructor(key: CacheKey, expected: CacheValueKind, actual: CacheValueKind) {
    super(`Key ${key} holds a ${actual}, not a ${expected}`, {
      code: "cache_wrong_type",
      context: { key, expected, actual },
    })
  }
}
