import type { UnixMs } from "./time"

export interface Clock {
  /**
   * Current time as a Date.
   *
   * @remarks
   * Prefer `nowMs()` for arithmetic.
   */
  now(): Date

  nowMs(): UnixMs
}
