/**
 * Database Service
 *
 * Provides the primary interface to the relational store holding the imported
 * IMDb datasets. Exposed to the server through the 'database' Fastify plugin
 * as `fastify.db`, and created directly by the command line tools.
 *
 * Responsible for:
 * - Connection setup for better-sqlite3 (default) or PostgreSQL
 * - Schema migrations
 * - Conflict-ignoring bulk inserts used by the importer
 * - Title search, movie detail and credit lookups
 * - Import run bookkeeping and dataset statistics
 *
 * Query methods live in ./database/methods and are attached to the
 * prototype below; their signatures are declared in ./database/types.
 *
 * @example
 * fastify.get('/v1/stats', async () => {
 *   return fastify.db.getDatasetCounts()
 * })
 */
import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import type { DatabaseConfig } from '@root/types/config.types.js'
import { resolveMigrationsDir } from '@utils/data-dir.js'
import { configurePgTypes } from '@utils/postgres-config.js'
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'
import * as importRunMethods from './database/methods/import-runs.js'
import * as movieMethods from './database/methods/movies.js'
import * as peopleMethods from './database/methods/people.js'
import * as principalMethods from './database/methods/principals.js'
import * as ratingMethods from './database/methods/ratings.js'

/** SQL function registered on SQLite connections that lowercases Unicode text */
export const UNICODE_LOWER = 'unicode_lower'

export class DatabaseService {
  public readonly knex: Knex
  public readonly isPostgres: boolean

  private constructor(
    public readonly log: FastifyBaseLogger,
    config: DatabaseConfig,
  ) {
    this.isPostgres = config.dbType === 'postgres'
    this.knex = knex(DatabaseService.createKnexConfig(config, log))
  }

  /**
   * Creates a DatabaseService, preparing the driver first.
   *
   * For SQLite the database directory is created if missing; for PostgreSQL
   * the type parsers are installed before the first connection.
   */
  static async create(
    log: FastifyBaseLogger,
    config: DatabaseConfig,
  ): Promise<DatabaseService> {
    if (config.dbType === 'postgres') {
      await configurePgTypes(log)
    } else {
      fs.mkdirSync(dirname(resolve(config.dbPath)), { recursive: true })
    }
    return new DatabaseService(log, config)
  }

  /**
   * Creates Knex configuration for better-sqlite3 or pg
   */
  private static createKnexConfig(
    config: DatabaseConfig,
    log: FastifyBaseLogger,
  ): Knex.Config {
    const logConfig = {
      warn: (message: string) => log.warn(message),
      error: (message: string | Error) => {
        log.error(message instanceof Error ? message.message : message)
      },
      debug: (message: string) => log.debug(message),
    }

    if (config.dbType === 'postgres') {
      return {
        client: 'pg',
        connection: config.dbConnectionString.trim()
          ? config.dbConnectionString.trim()
          : {
              host: config.dbHost,
              port: config.dbPort,
              user: config.dbUser,
              password: config.dbPassword,
              database: config.dbName,
            },
        pool: {
          min: 2,
          max: 10,
        },
        log: logConfig,
      }
    }

    return {
      client: 'better-sqlite3',
      connection: {
        filename: config.dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        afterCreate: (
          conn: {
            pragma: (source: string) => unknown
            function: (
              name: string,
              options: { deterministic: boolean },
              fn: (value: unknown) => unknown,
            ) => unknown
          },
          cb: (err: Error | null, conn: unknown) => void,
        ) => {
          conn.pragma('foreign_keys = ON')
          conn.pragma('busy_timeout = 5000')
          // SQLite's LOWER() folds ASCII only
          conn.function(UNICODE_LOWER, { deterministic: true }, (value) =>
            typeof value === 'string' ? value.toLowerCase() : value,
          )
          cb(null, conn)
        },
      },
      log: logConfig,
    }
  }

  /**
   * Applies pending migrations from migrations/migrations
   *
   * @returns Names of the migrations that were applied
   */
  async migrateLatest(): Promise<string[]> {
    const [, applied]: [number, string[]] = await this.knex.migrate.latest({
      directory: resolveMigrationsDir(),
    })
    return applied
  }

  /**
   * Closes the database connection
   *
   * Should be called during application shutdown to properly clean up resources.
   */
  async close(): Promise<void> {
    await this.knex.destroy()
  }

  /**
   * Inserts rows in statement-sized chunks, skipping rows that collide with
   * an existing row on the conflict columns.
   *
   * SQLite limits the number of bound variables per statement, so chunks are
   * smaller there.
   */
  async insertIgnoringConflicts<T extends object>(
    trx: Knex.Transaction,
    table: string,
    rows: T[],
    conflictColumns: string[],
  ): Promise<void> {
    if (rows.length === 0) return

    const chunkSize = this.isPostgres ? 1000 : 100
    for (const chunk of this.chunkArray(rows, chunkSize)) {
      await trx(table).insert(chunk).onConflict(conflictColumns).ignore()
    }
  }

  /**
   * Reads the generated id from an `insert(...).returning('id')` result,
   * which is `[{ id }]` on PostgreSQL and may be `[id]` on SQLite.
   */
  extractId(result: unknown): number {
    const first: unknown = Array.isArray(result) ? result[0] : result
    const id =
      typeof first === 'object' && first !== null && 'id' in first
        ? first.id
        : first
    const numeric = Number(id)
    if (!Number.isInteger(numeric)) {
      throw new Error('Insert did not return a generated id')
    }
    return numeric
  }

  /**
   * Splits an array into arrays of at most `size` elements
   */
  chunkArray<T>(array: T[], size: number): T[][] {
    const chunks: T[][] = []
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size))
    }
    return chunks
  }

  /**
   * Name of the SQL function that lowercases text on the active engine
   */
  get lowerFunction(): string {
    return this.isPostgres ? 'LOWER' : UNICODE_LOWER
  }

  /**
   * Current time as an ISO-8601 string
   */
  get timestamp(): string {
    return new Date().toISOString()
  }
}

Object.assign(
  DatabaseService.prototype,
  peopleMethods,
  movieMethods,
  ratingMethods,
  principalMethods,
  importRunMethods,
)
