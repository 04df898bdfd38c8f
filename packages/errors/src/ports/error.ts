export type ErrorCode = Lowercase<string>

/**
 * Structured metadata carried by an error (ids, inputs, limits).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` when the same call may succeed if attempted again (timeouts,
   * flaky I/O).
   */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, unreachable store,
   * timeout), `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}
