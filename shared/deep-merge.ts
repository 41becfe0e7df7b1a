export type PlainObject = Record<string, unknown>

export function isPlainObject(value: unknown): value is PlainObject {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return false
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function clonePlain(value: unknown): unknown {
  return isPlainObject(value) ? deepMerge(value, undefined) : value
}

/**
 * Recursively merges `override` onto `base` and returns a new tree. Every
 * plain object in the result is a fresh copy, so the result shares no
 * objects with either input.
 * Objects merge key by key; any other value replaces what was there,
 * including when one side is an object and the other is not. Keys whose
 * override value is undefined are skipped.
 */
export function deepMerge<T extends PlainObject>(base: T, override: PlainObject | undefined): T {
  const out: PlainObject = {}
  for (const [key, value] of Object.entries(base)) {
    out[key] = clonePlain(value)
  }
  if (!override) return out as T

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue
    const current = out[key]
    if (isPlainObject(value) && isPlainObject(current)) {
      out[key] = deepMerge(current, value)
    } else {
      out[key] = clonePlain(value)
    }
  }
  return out as T
}
