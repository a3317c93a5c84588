/**
 * List-valued columns are stored as JSON text on both SQLite and PostgreSQL.
 */
export function toJsonList(values: string[] | null): string | null {
  return values === null ? null : JSON.stringify(values)
}

/**
 * Reads a JSON list column back into strings. Non-string members are dropped
 * and unparseable text yields an empty list.
 */
export function parseJsonList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string')
  }
  if (typeof value !== 'string' || value === '') return []

  let parsed: unknown
  try {
    parsed = JSON.parse(value)
  } catch {
    return []
  }
  return Array.isArray(parsed) ? parseJsonList(parsed) : []
}
