import { z } from "zod/mini"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: z.ZodMiniType<T>
  /** Applied in order. Defaults to the process environment. */
  sources?: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigError(
      z.prettifyError(result.error),
      result.error.issues.length,
    )
  }

  const resolved: Record<string, string> = {}

  for (const key of Object.keys(result.data)) {
    resolved[key] = provenance[key] ?? "default"
  }

  return new Config<T>(result.data, resolved, new Set(Object.keys(merged)))
}
