#!/usr/bin/env node
/**
 * Marquee command line.
 *
 * Usage:
 *   marquee import-data <directory> [--batch-size <n>]
 *   marquee generate-query-set [--output <path>] [--count <n>]
 *
 * Examples:
 *   npm run import-data -- ./data/imdb
 *   npm run import-data -- ./data/imdb --batch-size 5000
 *   npm run generate-query-set -- --output load-test/queries.txt --count 2000
 */
import type { Config } from '@root/types/config.types.js'
import { DatabaseService } from '@services/database.service.js'
import { ImdbImportService } from '@services/imdb-import.service.js'
import {
  DEFAULT_QUERY_COUNT,
  DEFAULT_QUERY_SET_PATH,
  QuerySetService,
} from '@services/query-set.service.js'
import { loadConfig } from '@utils/config.js'
import { createCliLogger, validLogLevels } from '@utils/logger.js'
import { Command } from 'commander'
import type { Logger } from 'pino'
import { parsePositiveInt } from './options.js'

/**
 * Opens the database with the environment's configuration, runs `task` and
 * always closes the connection afterwards.
 */
async function withDatabase(
  log: Logger,
  task: (db: DatabaseService, config: Config) => Promise<void>,
): Promise<void> {
  const config = loadConfig(log)
  const db = await DatabaseService.create(log, config)
  try {
    await task(db, config)
  } finally {
    await db.close()
  }
}

function createLogger(): Logger {
  const configured = process.env.logLevel
  const level = validLogLevels.find((candidate) => candidate === configured)
  return createCliLogger(level ?? 'info')
}

const program = new Command()

program
  .name('marquee')
  .description('Load IMDb datasets and generate search load-test queries')

program
  .command('import-data')
  .description(
    'Import name.basics, title.basics, title.ratings and title.principals (.tsv or .tsv.gz) from a directory',
  )
  .argument('<directory>', 'Directory holding the IMDb dataset files')
  .option(
    '-b, --batch-size <n>',
    'Rows per write transaction for every dataset (default: per dataset)',
    parsePositiveInt,
  )
  .action(async (directory: string, options: { batchSize?: number }) => {
    const log = createLogger()
    try {
      await withDatabase(log, async (db, config) => {
        const applied = await db.migrateLatest()
        if (applied.length > 0) {
          log.info(`Applied migrations: ${applied.join(', ')}`)
        }

        const importer = new ImdbImportService(db, log)
        const result = await importer.importDirectory(directory, {
          batchSize: options.batchSize ?? config.importBatchSize,
        })

        for (const [dataset, stats] of Object.entries(result.summary)) {
          log.info(
            `${dataset}: processed ${stats.processed}, inserted ${stats.inserted}, malformed ${stats.skippedMalformed}, missing references ${stats.skippedMissingReference}, failed ${stats.failed}`,
          )
        }
      })
    } catch (error) {
      log.error({ error }, 'import-data failed')
      process.exitCode = 1
    }
  })

program
  .command('generate-query-set')
  .description(
    'Write movie titles sampled by vote count, one per line, for load-testing search',
  )
  .option('-o, --output <path>', 'Output file', DEFAULT_QUERY_SET_PATH)
  .option(
    '-c, --count <n>',
    'Number of titles to sample',
    parsePositiveInt,
    DEFAULT_QUERY_COUNT,
  )
  .action(async (options: { output: string; count: number }) => {
    const log = createLogger()
    try {
      await withDatabase(log, async (db) => {
        const generator = new QuerySetService(db, log)
        const result = await generator.generate(options)
        log.info(
          `Generated ${result.count} queries from ${result.candidates} rated movies into ${result.outputPath}`,
        )
      })
    } catch (error) {
      log.error({ error }, 'generate-query-set failed')
      process.exitCode = 1
    }
  })

await program.parseAsync()
