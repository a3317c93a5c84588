import { afterAll } from 'vitest'
import { cleanupTestDatabase } from '../helpers/database.js'

/**
 * Removes this worker's temp database once its test file finishes
 */
afterAll(async () => {
  await cleanupTestDatabase()
})
