import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

export const projectRoot = resolve(__dirname, '..', '..')

/**
 * Resolves the data directory.
 *
 * Priority:
 * 1. process.env.dataDir (explicit override)
 * 2. {projectRoot}/data
 */
export function resolveDataDir(): string {
  if (process.env.dataDir) {
    return resolve(process.env.dataDir)
  }
  return resolve(projectRoot, 'data')
}

/**
 * Resolves the database directory path: {dataDir}/db
 */
export function resolveDbPath(): string {
  return resolve(resolveDataDir(), 'db')
}

/**
 * Resolves the log directory path: {dataDir}/logs
 */
export function resolveLogPath(): string {
  return resolve(resolveDataDir(), 'logs')
}

/**
 * Resolves the .env file path: {cwd}/.env
 */
export function resolveEnvPath(): string {
  return resolve(process.cwd(), '.env')
}

/**
 * Resolves the knex migrations directory, next to the compiled or source tree
 */
export function resolveMigrationsDir(): string {
  return resolve(projectRoot, 'migrations', 'migrations')
}
