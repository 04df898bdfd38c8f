/**
 * Validated configuration with provenance for every key.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ SERVER_PORT: z._default(z.coerce.number(), 8080) }),
 *   sources: [
 *     new DotenvSource({ file: ".env", required: false }),
 *     new EnvSource(),
 *   ],
 * })
 *
 * config.get("SERVER_PORT")     // 8080
 * config.explain("SERVER_PORT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that provided the final value for a key, or
   * "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys present in the sources but absent from the validated output. */
  unknownKeys(): string[]
}
