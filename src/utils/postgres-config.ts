/**
 * PostgreSQL configuration utilities
 *
 * Handles PostgreSQL-specific configuration including type parsers
 */
import type { FastifyBaseLogger } from 'fastify'
import type { types as PgTypes } from 'pg'

// Track if type parsers have been configured to prevent duplicate setup
let pgTypesConfigured = false

/**
 * Configure PostgreSQL type parsers so rows read the same as under SQLite:
 * timestamps and JSON as strings, NUMERIC and BIGINT counts as numbers.
 */
export async function configurePgTypes(log: FastifyBaseLogger): Promise<void> {
  if (pgTypesConfigured) return

  try {
    const pg = await import('pg')
    const types = pg.default.types

    if (types && typeof types === 'object' && 'setTypeParser' in types) {
      const typesParser: typeof PgTypes = types

      // Timestamps - return as strings
      typesParser.setTypeParser(1114, (str: string) => str) // timestamp without timezone
      typesParser.setTypeParser(1184, (str: string) => str) // timestamp with timezone

      // JSON types - return as strings for JSON.parse() compatibility
      typesParser.setTypeParser(114, (str: string) => str) // json
      typesParser.setTypeParser(3802, (str: string) => str) // jsonb

      // Numbers that pg returns as strings by default
      typesParser.setTypeParser(1700, (str: string) => Number.parseFloat(str)) // numeric
      typesParser.setTypeParser(20, (str: string) => Number.parseInt(str, 10)) // int8 (count)

      pgTypesConfigured = true
      log.debug('PostgreSQL type parsers configured successfully')
    } else {
      log.warn('PostgreSQL types.setTypeParser not available')
    }
  } catch (error) {
    log.warn({ error }, 'Failed to configure PostgreSQL type parsers')
  }
}
