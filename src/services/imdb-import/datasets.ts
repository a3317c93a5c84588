/**
 * Per-dataset import definitions: source file, required columns, default
 * batch size, row mapping, reference filtering and persistence.
 */
import type {
  InsertMovie,
  InsertPerson,
  InsertPrincipal,
  InsertRating,
} from '@root/types/imdb.types.js'
import type { DatasetName } from '@root/types/import.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { Knex } from 'knex'
import {
  mapMovieRow,
  mapPersonRow,
  mapPrincipalRow,
  mapRatingRow,
  type RowMapper,
} from './row-mappers.js'

export interface DatasetDefinition<T> {
  name: DatasetName
  /** Uncompressed file name; `<fileName>.gz` is accepted too */
  fileName: string
  requiredColumns: readonly string[]
  defaultBatchSize: number
  mapRow: RowMapper<T>
  /**
   * Drops rows whose foreign keys point at rows that do not exist.
   * Absent for datasets without references.
   */
  filterReferences?: (
    db: DatabaseService,
    rows: T[],
    trx: Knex.Transaction,
  ) => Promise<T[]>
  insert: (
    db: DatabaseService,
    rows: T[],
    trx: Knex.Transaction,
  ) => Promise<void>
  count: (db: DatabaseService) => Promise<number>
}

export const peopleDataset: DatasetDefinition<InsertPerson> = {
  name: 'people',
  fileName: 'name.basics.tsv',
  requiredColumns: ['nconst', 'primaryName'],
  defaultBatchSize: 20_000,
  mapRow: mapPersonRow,
  insert: (db, rows, trx) => db.insertPeople(rows, trx),
  count: (db) => db.getPeopleCount(),
}

export const moviesDataset: DatasetDefinition<InsertMovie> = {
  name: 'movies',
  fileName: 'title.basics.tsv',
  requiredColumns: ['tconst', 'titleType', 'primaryTitle'],
  defaultBatchSize: 10_000,
  mapRow: mapMovieRow,
  insert: (db, rows, trx) => db.insertMovies(rows, trx),
  count: (db) => db.getMovieCount(),
}

export const ratingsDataset: DatasetDefinition<InsertRating> = {
  name: 'ratings',
  fileName: 'title.ratings.tsv',
  requiredColumns: ['tconst', 'averageRating', 'numVotes'],
  defaultBatchSize: 10_000,
  mapRow: mapRatingRow,
  filterReferences: async (db, rows, trx) => {
    const movies = await db.getExistingTconsts(
      rows.map((row) => row.tconst),
      trx,
    )
    return rows.filter((row) => movies.has(row.tconst))
  },
  insert: (db, rows, trx) => db.insertRatings(rows, trx),
  count: (db) => db.getRatingCount(),
}

export const principalsDataset: DatasetDefinition<InsertPrincipal> = {
  name: 'principals',
  fileName: 'title.principals.tsv',
  requiredColumns: ['tconst', 'ordering', 'nconst', 'category'],
  defaultBatchSize: 50_000,
  mapRow: mapPrincipalRow,
  filterReferences: async (db, rows, trx) => {
    const [movies, people] = await Promise.all([
      db.getExistingTconsts(
        rows.map((row) => row.tconst),
        trx,
      ),
      db.getExistingNconsts(
        rows.map((row) => row.nconst),
        trx,
      ),
    ])
    return rows.filter(
      (row) => movies.has(row.tconst) && people.has(row.nconst),
    )
  },
  insert: (db, rows, trx) => db.insertPrincipals(rows, trx),
  count: (db) => db.getPrincipalCount(),
}

/**
 * Source file names keyed by dataset, in load order
 */
export const DATASET_FILES: Record<DatasetName, string> = {
  people: peopleDataset.fileName,
  movies: moviesDataset.fileName,
  ratings: ratingsDataset.fileName,
  principals: principalsDataset.fileName,
}
