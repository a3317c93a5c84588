import knex from 'knex'
import config from './knexfile.js'

/**
 * Rolls back the latest migration batch.
 */
async function rollback() {
  const db = knex(config.development)

  try {
    const [, reverted]: [number, string[]] = await db.migrate.rollback()
    console.log(`Rolled back: ${reverted.join(', ') || 'nothing'}`)
  } catch (err) {
    console.error('Error rolling back migration:', err)
    process.exitCode = 1
  } finally {
    await db.destroy()
  }
}

await rollback()
