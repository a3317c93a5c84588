/**
 * IMDb Import Service
 *
 * Loads the four IMDb TSV datasets (name.basics, title.basics, title.ratings,
 * title.principals) from a directory into the database.
 *
 * Files are streamed line by line and written in batches, one transaction per
 * batch, with conflicting rows ignored so an import can be re-run safely.
 * Datasets load in foreign-key order: people, movies, ratings, principals.
 */
import { constants } from 'node:fs'
import { access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { ImportFileError } from '@root/types/errors.js'
import type {
  DatasetName,
  DatasetStats,
  ImportOptions,
  ImportResult,
  ImportSummary,
} from '@root/types/import.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { readLines } from '@utils/line-stream.js'
import { createServiceLogger } from '@utils/logger.js'
import {
  MissingColumnsError,
  parseHeader,
  splitTsvLine,
  type TsvHeader,
} from '@utils/tsv.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  DATASET_FILES,
  type DatasetDefinition,
  moviesDataset,
  peopleDataset,
  principalsDataset,
  ratingsDataset,
} from './imdb-import/datasets.js'

const PROGRESS_EVERY_BATCHES = 5

function isReadable(filePath: string): Promise<boolean> {
  return access(filePath, constants.R_OK).then(
    () => true,
    () => false,
  )
}

export function createEmptyStats(): DatasetStats {
  return {
    processed: 0,
    inserted: 0,
    skippedMalformed: 0,
    skippedMissingReference: 0,
    failed: 0,
  }
}

export function createEmptySummary(): ImportSummary {
  return {
    people: createEmptyStats(),
    movies: createEmptyStats(),
    ratings: createEmptyStats(),
    principals: createEmptyStats(),
  }
}

export class ImdbImportService {
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'IMDB_IMPORT')
  }

  constructor(
    private readonly db: DatabaseService,
    private readonly baseLog: FastifyBaseLogger,
  ) {}

  /**
   * Imports every dataset found in `directory`.
   *
   * All four files are located before anything is written. The run is
   * recorded in import_runs whether it completes or fails.
   *
   * @throws {ImportFileError} When a dataset file is missing, unreadable or
   * lacks a required column
   */
  async importDirectory(
    directory: string,
    options: ImportOptions = {},
  ): Promise<ImportResult> {
    const startedAt = Date.now()
    const root = resolve(directory)
    const files = await this.resolveDatasetFiles(root)

    this.log.info(`Starting IMDb import from ${root}`)
    const runId = await this.db.createImportRun(root)
    const summary = createEmptySummary()

    try {
      await this.loadDataset(
        peopleDataset,
        files.people,
        summary.people,
        options,
      )
      await this.loadDataset(
        moviesDataset,
        files.movies,
        summary.movies,
        options,
      )
      await this.loadDataset(
        ratingsDataset,
        files.ratings,
        summary.ratings,
        options,
      )
      await this.loadDataset(
        principalsDataset,
        files.principals,
        summary.principals,
        options,
      )
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.log.error({ error }, `IMDb import from ${root} failed`)
      await this.db.failImportRun(runId, message, summary)
      throw error
    }

    await this.db.completeImportRun(runId, summary)
    const durationMs = Date.now() - startedAt
    this.log.info(
      { summary },
      `IMDb import from ${root} completed in ${(durationMs / 1000).toFixed(1)}s`,
    )

    return { runId, directory: root, summary, durationMs }
  }

  /**
   * Locates each dataset file, preferring the plain `.tsv` over `.tsv.gz`.
   */
  async resolveDatasetFiles(
    directory: string,
  ): Promise<Record<DatasetName, string>> {
    return {
      people: await this.resolveDatasetFile(directory, 'people'),
      movies: await this.resolveDatasetFile(directory, 'movies'),
      ratings: await this.resolveDatasetFile(directory, 'ratings'),
      principals: await this.resolveDatasetFile(directory, 'principals'),
    }
  }

  private async resolveDatasetFile(
    directory: string,
    name: DatasetName,
  ): Promise<string> {
    const fileName = DATASET_FILES[name]
    const plain = join(directory, fileName)
    const gzipped = `${plain}.gz`

    if (await isReadable(plain)) return plain
    if (await isReadable(gzipped)) return gzipped

    throw new ImportFileError(
      `Missing ${name} dataset: expected ${fileName} or ${fileName}.gz in ${directory}`,
      name,
      plain,
    )
  }

  private async loadDataset<T>(
    definition: DatasetDefinition<T>,
    filePath: string,
    stats: DatasetStats,
    options: ImportOptions,
  ): Promise<void> {
    const batchSize =
      options.batchSize && options.batchSize > 0
        ? options.batchSize
        : definition.defaultBatchSize
    const countBefore = await definition.count(this.db)

    this.log.info(`Loading ${definition.name} from ${filePath}`)

    let header: TsvHeader | null = null
    let lineNumber = 0
    let batches = 0
    let batch: T[] = []

    try {
      for await (const line of readLines(filePath)) {
        lineNumber++

        if (header === null) {
          header = parseHeader(line, definition.requiredColumns)
          continue
        }
        if (line.length === 0) continue

        stats.processed++
        const result = definition.mapRow(splitTsvLine(line), header)
        if ('skip' in result) {
          stats.skippedMalformed++
          this.log.debug(
            `Skipping malformed ${definition.name} row at line ${lineNumber}: ${result.skip}`,
          )
          continue
        }

        batch.push(result.row)
        if (batch.length >= batchSize) {
          await this.writeBatch(definition, batch, stats)
          batch = []
          batches++
          if (batches % PROGRESS_EVERY_BATCHES === 0) {
            this.log.info(
              `${definition.name}: processed ${stats.processed} rows (malformed ${stats.skippedMalformed}, missing references ${stats.skippedMissingReference}, failed ${stats.failed})`,
            )
          }
        }
      }
    } catch (error) {
      if (error instanceof MissingColumnsError) {
        throw new ImportFileError(
          `${filePath}: ${error.message}`,
          definition.name,
          filePath,
          { cause: error },
        )
      }
      throw new ImportFileError(
        `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        definition.name,
        filePath,
        { cause: error },
      )
    }

    if (header === null) {
      throw new ImportFileError(
        `${filePath} is empty; expected a header line`,
        definition.name,
        filePath,
      )
    }

    if (batch.length > 0) {
      await this.writeBatch(definition, batch, stats)
    }

    stats.inserted = (await definition.count(this.db)) - countBefore
    this.log.info(
      `Finished ${definition.name}: processed ${stats.processed}, inserted ${stats.inserted}, malformed ${stats.skippedMalformed}, missing references ${stats.skippedMissingReference}, failed ${stats.failed}`,
    )
  }

  /**
   * Writes one batch in its own transaction. A failed batch is logged and
   * counted; the import carries on with the next one.
   */
  private async writeBatch<T>(
    definition: DatasetDefinition<T>,
    rows: T[],
    stats: DatasetStats,
  ): Promise<void> {
    let missingReferences = 0

    try {
      await this.db.knex.transaction(async (trx) => {
        const accepted = definition.filterReferences
          ? await definition.filterReferences(this.db, rows, trx)
          : rows
        missingReferences = rows.length - accepted.length
        await definition.insert(this.db, accepted, trx)
      })
      stats.skippedMissingReference += missingReferences
    } catch (error) {
      stats.skippedMissingReference += missingReferences
      stats.failed += rows.length - missingReferences
      this.log.error(
        { error },
        `Failed to write ${definition.name} batch of ${rows.length} rows`,
      )
    }
  }
}
