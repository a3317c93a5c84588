import knex from 'knex'
import config from './knexfile.js'

/**
 * Applies every pending migration, then closes the connection.
 */
async function migrate() {
  const db = knex(config.development)

  try {
    const [, applied]: [number, string[]] = await db.migrate.latest()
    console.log(
      applied.length > 0
        ? `Applied migrations: ${applied.join(', ')}`
        : 'Database schema already up to date',
    )
  } catch (err) {
    console.error('Error running migrations:', err)
    process.exitCode = 1
  } finally {
    await db.destroy()
  }
}

await migrate()
