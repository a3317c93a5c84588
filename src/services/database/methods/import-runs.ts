import type { DatasetCounts } from '@root/types/imdb.types.js'
import type {
  ImportRun,
  ImportRunRow,
  ImportSummary,
} from '@root/types/import.types.js'
import { ImportSummarySchema } from '@schemas/stats/stats.schema.js'
import type { DatabaseService } from '@services/database.service.js'

function parseSummary(value: string | null): ImportSummary | null {
  if (!value) return null

  let parsed: unknown
  try {
    parsed = JSON.parse(value)
  } catch {
    return null
  }
  const result = ImportSummarySchema.safeParse(parsed)
  return result.success ? result.data : null
}

/**
 * Records the start of an import and returns the run id.
 */
export async function createImportRun(
  this: DatabaseService,
  directory: string,
): Promise<number> {
  const result = await this.knex('import_runs')
    .insert({
      directory,
      status: 'running',
      started_at: this.timestamp,
    })
    .returning('id')

  return this.extractId(result)
}

/**
 * Marks a run completed and stores its per-dataset statistics.
 */
export async function completeImportRun(
  this: DatabaseService,
  id: number,
  summary: ImportSummary,
): Promise<void> {
  await this.knex('import_runs')
    .where({ id })
    .update({
      status: 'completed',
      finished_at: this.timestamp,
      summary: JSON.stringify(summary),
    })
}

/**
 * Marks a run failed, keeping whatever statistics were gathered.
 */
export async function failImportRun(
  this: DatabaseService,
  id: number,
  error: string,
  summary: ImportSummary,
): Promise<void> {
  await this.knex('import_runs')
    .where({ id })
    .update({
      status: 'failed',
      finished_at: this.timestamp,
      summary: JSON.stringify(summary),
      error,
    })
}

/**
 * Returns the most recently started import run, if any.
 */
export async function getLatestImportRun(
  this: DatabaseService,
): Promise<ImportRun | null> {
  const row = await this.knex<ImportRunRow>('import_runs')
    .orderBy([
      { column: 'started_at', order: 'desc' },
      { column: 'id', order: 'desc' },
    ])
    .first()

  if (!row) return null

  return {
    id: Number(row.id),
    directory: row.directory,
    status: row.status,
    startedAt: String(row.started_at),
    finishedAt: row.finished_at === null ? null : String(row.finished_at),
    summary: parseSummary(row.summary),
    error: row.error,
  }
}

/**
 * Row counts of the four dataset tables.
 */
export async function getDatasetCounts(
  this: DatabaseService,
): Promise<DatasetCounts> {
  const [people, movies, ratings, principals] = await Promise.all([
    this.getPeopleCount(),
    this.getMovieCount(),
    this.getRatingCount(),
    this.getPrincipalCount(),
  ])
  return { people, movies, ratings, principals }
}
