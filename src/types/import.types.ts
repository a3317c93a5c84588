import type { DatasetCounts } from '@root/types/imdb.types.js'

/**
 * Datasets loaded by an import, in foreign-key order
 */
export const DATASET_NAMES = [
  'people',
  'movies',
  'ratings',
  'principals',
] as const

export type DatasetName = (typeof DATASET_NAMES)[number]

export interface DatasetStats {
  /** Data lines read, header excluded */
  processed: number
  /** Net rows added to the table */
  inserted: number
  skippedMalformed: number
  skippedMissingReference: number
  /** Rows in batches whose write failed */
  failed: number
}

export type ImportSummary = Record<DatasetName, DatasetStats>

export interface ImportOptions {
  /**
   * Rows per write transaction. Applied to every dataset when set,
   * otherwise each dataset uses its own default.
   */
  batchSize?: number
}

export interface ImportResult {
  runId: number
  directory: string
  summary: ImportSummary
  durationMs: number
}

export type ImportRunStatus = 'running' | 'completed' | 'failed'

/**
 * Database row type for import_runs table
 */
export interface ImportRunRow {
  id: number
  directory: string
  status: ImportRunStatus
  started_at: string
  finished_at: string | null
  summary: string | null
  error: string | null
}

export interface ImportRun {
  id: number
  directory: string
  status: ImportRunStatus
  startedAt: string
  finishedAt: string | null
  summary: ImportSummary | null
  error: string | null
}

export interface DatasetStatistics {
  counts: DatasetCounts
  lastImport: ImportRun | null
}
