export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> | T[P] : T[P]
}

/**
 * Applies structural overrides to an object tree.
 *
 * Plain objects are deep-merged. Anything else (class instances, arrays,
 * Dates, Maps, functions) is replaced whole, so overriding a service swaps
 * the instance rather than merging into it.
 */
export function applyOverrides<T extends object>(
  base: T,
  overrides: DeepPartial<T> = {},
): T {
  // The merge walks T's own keys, so the result keeps T's shape.
  return deepMerge(base, overrides) as T
}

function deepMerge(base: object, overrides: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }

  for (const [key, overrideVal] of Object.entries(overrides)) {
    if (overrideVal === undefined) continue

    const baseVal: unknown = Reflect.get(base, key)

    result[key] =
      isPlainObject(baseVal) && isPlainObject(overrideVal)
        ? deepMerge(baseVal, overrideVal)
        : overrideVal
  }

  return result
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false
  }

  const proto = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}
