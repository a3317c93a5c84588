import type { DatasetCounts } from '@root/types/imdb.types.js'
import type { ImportRun, ImportSummary } from '@root/types/import.types.js'

declare module '@services/database.service.js' {
  interface DatabaseService {
    // IMPORT RUNS
    /**
     * Records the start of an import and returns the run id.
     */
    createImportRun(directory: string): Promise<number>

    /**
     * Marks a run completed with its statistics.
     */
    completeImportRun(id: number, summary: ImportSummary): Promise<void>

    /**
     * Marks a run failed, keeping the statistics gathered so far.
     */
    failImportRun(
      id: number,
      error: string,
      summary: ImportSummary,
    ): Promise<void>

    /**
     * Returns the most recently started import run.
     */
    getLatestImportRun(): Promise<ImportRun | null>

    /**
     * Row counts of the four dataset tables.
     */
    getDatasetCounts(): Promise<DatasetCounts>
  }
}
