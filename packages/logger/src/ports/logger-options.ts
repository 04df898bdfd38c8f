import type { LogLevelName } from "./log-level"

/**
 * Logger policy. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local development. Leave off in production,
   * where JSON lines are expected.
   */
  prettify?: boolean
}
