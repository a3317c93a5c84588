import type { DatasetName } from '@root/types/import.types.js'

/**
 * Raised when an input dataset cannot be found, read or understood.
 * Aborts the whole import.
 */
export class ImportFileError extends Error {
  constructor(
    message: string,
    public readonly dataset: DatasetName,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ImportFileError'
  }
}

/**
 * Raised when a query set cannot be generated from the loaded data
 */
export class QuerySetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'QuerySetError'
  }
}
