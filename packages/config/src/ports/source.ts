/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and merging happen in
 * `loadConfig`, where later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "dotenv:.env.test" */
  readonly name: string

  /** An undefined value means "not provided". */
  load(): Promise<Record<string, unknown>>
}
