import type { Config, DatabaseConfig } from '@root/types/config.types.js'
import { resolveEnvPath } from '@utils/data-dir.js'
import envSchema from 'env-schema'

const DEFAULT_PG_PASSWORD = 'marqueepostgrespw'

/**
 * JSON schema for every configuration key. Shared by the Fastify env plugin
 * and the command line, so both read the same environment the same way.
 */
export const configSchema = {
  type: 'object',
  required: ['port'],
  properties: {
    baseUrl: {
      type: 'string',
      default: 'http://localhost',
    },
    port: {
      type: 'number',
      default: 3003,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    dbType: {
      type: 'string',
      enum: ['sqlite', 'postgres'],
      default: 'sqlite',
    },
    dbPath: {
      type: 'string',
      default: './data/db/marquee.db',
    },
    dbHost: {
      type: 'string',
      default: 'localhost',
    },
    dbPort: {
      type: 'number',
      default: 5432,
    },
    dbName: {
      type: 'string',
      default: 'marquee',
    },
    dbUser: {
      type: 'string',
      default: 'postgres',
    },
    dbPassword: {
      type: 'string',
      default: DEFAULT_PG_PASSWORD,
    },
    dbConnectionString: {
      type: 'string',
      default: '',
    },
    // 0 keeps each dataset's own batch size
    importBatchSize: {
      type: 'number',
      minimum: 0,
      default: 0,
    },
    searchLimit: {
      type: 'number',
      minimum: 1,
      maximum: 200,
      default: 50,
    },
    detailCastLimit: {
      type: 'number',
      minimum: 0,
      default: 10,
    },
  },
} as const

interface ConfigWarningSink {
  warn(msg: string): void
}

/**
 * Validates the PostgreSQL connection settings. SQLite needs no checks.
 *
 * @throws Error when a required PostgreSQL setting is missing or malformed
 */
export function validateDatabaseConfig(
  config: DatabaseConfig,
  log: ConfigWarningSink,
): void {
  if (config.dbType !== 'postgres') return

  const connStr = config.dbConnectionString.trim()
  if (connStr !== '') {
    if (
      !connStr.startsWith('postgres://') &&
      !connStr.startsWith('postgresql://')
    ) {
      throw new Error(
        'Invalid PostgreSQL connection string format. Must start with postgres:// or postgresql://',
      )
    }
    return
  }

  if (config.dbPassword.trim() === '') {
    throw new Error(
      'dbPassword is required when using PostgreSQL. Please set a secure password.',
    )
  }

  if (config.dbPassword === DEFAULT_PG_PASSWORD) {
    log.warn(
      'WARNING: Using default PostgreSQL password. Please change this for production deployments!',
    )
  }

  if (config.dbHost.trim() === '') {
    throw new Error('dbHost is required when using PostgreSQL.')
  }

  if (config.dbName.trim() === '') {
    throw new Error('dbName is required when using PostgreSQL.')
  }

  if (config.dbUser.trim() === '') {
    throw new Error('dbUser is required when using PostgreSQL.')
  }
}

/**
 * Loads configuration outside of Fastify (command line entry points).
 * Reads `.env` from the working directory, then the process environment.
 */
export function loadConfig(log: ConfigWarningSink): Config {
  const config = envSchema<Config>({
    schema: configSchema,
    dotenv: { path: resolveEnvPath() },
    data: process.env,
  })
  validateDatabaseConfig(config, log)
  return config
}
