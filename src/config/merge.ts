export type ConfigRecord = Record<string, unknown>

export function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced, not merged.
 * Undefined values in source are ignored.
 */
export function deepMerge(
  target: ConfigRecord,
  source: ConfigRecord
): ConfigRecord {
  const result: ConfigRecord = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue

    const targetValue = target[key]
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue
  }

  return result
}

/**
 * Set a value at a dot-separated path in an object.
 * Creates intermediate objects as needed.
 */
export function setPath(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split('.')
  const last = parts.pop()
  if (last === undefined) return

  let current = obj
  for (const part of parts) {
    const next = current[part]
    if (isRecord(next)) {
      current = next
    } else {
      const created: ConfigRecord = {}
      current[part] = created
      current = created
    }
  }

  current[last] = value
}
