/**
 * Field-level helpers for IMDb's tab-separated datasets.
 *
 * Every dataset starts with a header line; `\N` stands for a missing value.
 */
import { IMDB_NULL } from '@root/types/imdb.types.js'

export interface TsvHeader {
  /** Number of columns the header declares */
  width: number
  /** Fields a row needs to reach every required column */
  requiredWidth: number
  positions: ReadonlyMap<string, number>
}

export class MissingColumnsError extends Error {
  constructor(public readonly columns: string[]) {
    super(`Header is missing required column(s): ${columns.join(', ')}`)
    this.name = 'MissingColumnsError'
  }
}

/**
 * Splits one line on tabs, dropping a trailing carriage return.
 */
export function splitTsvLine(line: string): string[] {
  const trimmed = line.endsWith('\r') ? line.slice(0, -1) : line
  return trimmed.split('\t')
}

/**
 * Indexes a header line by column name.
 *
 * @throws {MissingColumnsError} When any required column is absent
 */
export function parseHeader(
  line: string,
  requiredColumns: readonly string[],
): TsvHeader {
  const names = splitTsvLine(line).map((name) => name.trim())
  const positions = new Map<string, number>()
  names.forEach((name, index) => {
    if (!positions.has(name)) positions.set(name, index)
  })

  const missing = requiredColumns.filter((column) => !positions.has(column))
  if (missing.length > 0) {
    throw new MissingColumnsError(missing)
  }

  const requiredWidth = requiredColumns.reduce(
    (widest, column) => Math.max(widest, (positions.get(column) ?? 0) + 1),
    0,
  )

  return { width: names.length, requiredWidth, positions }
}

/**
 * Raw value of a named column, or null for `\N` and absent columns.
 */
export function getField(
  fields: readonly string[],
  header: TsvHeader,
  column: string,
): string | null {
  const position = header.positions.get(column)
  if (position === undefined) return null
  const value = fields[position]
  if (value === undefined || value === IMDB_NULL) return null
  return value
}

/**
 * Parses a base-10 integer. Anything else, including `\N`, yields null.
 */
export function parseInteger(value: string | null): number | null {
  if (value === null) return null
  const trimmed = value.trim()
  if (!/^[+-]?\d+$/.test(trimmed)) return null
  const parsed = Number.parseInt(trimmed, 10)
  return Number.isSafeInteger(parsed) ? parsed : null
}

/**
 * Parses a decimal such as `7.5`. Anything else yields null.
 */
export function parseDecimal(value: string | null): number | null {
  if (value === null) return null
  const trimmed = value.trim()
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(trimmed)) return null
  return Number.parseFloat(trimmed)
}

/**
 * Splits a comma-separated list, keeping first-seen order and dropping
 * empty entries and duplicates.
 */
export function parseList(value: string | null): string[] {
  if (value === null) return []
  const seen = new Set<string>()
  for (const entry of value.split(',')) {
    const item = entry.trim()
    if (item) seen.add(item)
  }
  return [...seen]
}

/**
 * Parses the `characters` column, a JSON array such as `["Self"]`.
 *
 * Text that is not a JSON array is kept as a single-element list.
 */
export function parseCharacters(value: string | null): string[] | null {
  if (value === null || value === '') return null

  let parsed: unknown
  try {
    parsed = JSON.parse(value)
  } catch {
    return [value]
  }

  if (!Array.isArray(parsed)) return [value]
  return parsed.map((item) => (typeof item === 'string' ? item : String(item)))
}
