import type { Milliseconds, Seconds } from "@usercache/clock"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type UntilDateTtl = { kind: "until"; expiresAt: Date }

export type CacheTtl = SecondsTtl | MillisecondsTtl | UntilDateTtl

export type CacheSetOptions = {
  /** Omitted means the entry never expires, clearing any earlier TTL. */
  ttl: CacheTtl
}
