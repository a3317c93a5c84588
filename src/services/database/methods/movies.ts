import type {
  MovieRow,
  MovieWithRatingRow,
} from '@root/types/database-rows.types.js'
import type {
  InsertMovie,
  MovieDetail,
  MovieSummary,
} from '@root/types/imdb.types.js'
import { isTconst } from '@root/types/imdb.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { parseJsonList, toJsonList } from '@utils/json-list.js'
import { containsPattern, LIKE_ESCAPE } from '@utils/like-pattern.js'
import type { Knex } from 'knex'

const MOVIE_WITH_RATING_COLUMNS = [
  'movies.tconst',
  'movies.title_type',
  'movies.primary_title',
  'movies.original_title',
  'movies.is_adult',
  'movies.start_year',
  'movies.end_year',
  'movies.runtime_minutes',
  'movies.genres',
  'ratings.tconst as rating_tconst',
  'ratings.average_rating',
  'ratings.num_votes',
]

function toMovieSummary(row: MovieWithRatingRow): MovieSummary | null {
  if (!isTconst(row.tconst)) return null

  return {
    tconst: row.tconst,
    titleType: row.title_type,
    primaryTitle: row.primary_title,
    originalTitle: row.original_title,
    startYear: row.start_year,
    runtimeMinutes: row.runtime_minutes,
    genres: parseJsonList(row.genres),
    rating:
      row.rating_tconst === null
        ? null
        : {
            averageRating:
              row.average_rating === null ? null : Number(row.average_rating),
            numVotes: row.num_votes === null ? null : Number(row.num_votes),
          },
  }
}

/**
 * Inserts movies, skipping any tconst already present.
 *
 * @param movies - Rows parsed from title.basics
 * @param trx - Transaction the batch is written in
 */
export async function insertMovies(
  this: DatabaseService,
  movies: InsertMovie[],
  trx: Knex.Transaction,
): Promise<void> {
  const rows = movies.map((movie) => ({
    ...movie,
    genres: toJsonList(movie.genres),
  }))
  await this.insertIgnoringConflicts(trx, 'movies', rows, ['tconst'])
}

/**
 * Returns the subset of the given tconsts that exist in the movies table.
 */
export async function getExistingTconsts(
  this: DatabaseService,
  tconsts: string[],
  trx?: Knex.Transaction,
): Promise<Set<string>> {
  const existing = new Set<string>()
  if (tconsts.length === 0) return existing

  const query: Knex = trx ?? this.knex
  for (const chunk of this.chunkArray([...new Set(tconsts)], 500)) {
    const rows: Pick<MovieRow, 'tconst'>[] = await query('movies')
      .whereIn('tconst', chunk)
      .select('tconst')
    for (const row of rows) existing.add(row.tconst)
  }
  return existing
}

/**
 * Case-insensitive substring search over primary and original titles.
 *
 * `%` and `_` in the term match literally. Results are ordered by primary
 * title, then tconst, and carry the movie's rating when one exists.
 *
 * @param term - Non-empty, already trimmed search text
 * @param limit - Maximum number of rows
 */
export async function searchMovies(
  this: DatabaseService,
  term: string,
  limit: number,
): Promise<MovieSummary[]> {
  const pattern = containsPattern(term.toLowerCase())
  const lower = this.lowerFunction

  const rows: MovieWithRatingRow[] = await this.knex('movies')
    .leftJoin('ratings', 'ratings.tconst', 'movies.tconst')
    .where((builder) => {
      builder
        .whereRaw(`${lower}(movies.primary_title) LIKE ? ESCAPE '${LIKE_ESCAPE}'`, [
          pattern,
        ])
        .orWhereRaw(
          `${lower}(movies.original_title) LIKE ? ESCAPE '${LIKE_ESCAPE}'`,
          [pattern],
        )
    })
    .orderBy([
      { column: 'movies.primary_title', order: 'asc' },
      { column: 'movies.tconst', order: 'asc' },
    ])
    .limit(limit)
    .select(MOVIE_WITH_RATING_COLUMNS)

  return rows.flatMap((row) => toMovieSummary(row) ?? [])
}

/**
 * Loads one movie with its rating, without credits.
 *
 * @returns The movie, or null when the tconst is unknown
 */
export async function getMovie(
  this: DatabaseService,
  tconst: string,
): Promise<Omit<MovieDetail, 'directors' | 'actors'> | null> {
  const row: MovieWithRatingRow | undefined = await this.knex('movies')
    .leftJoin('ratings', 'ratings.tconst', 'movies.tconst')
    .where('movies.tconst', tconst)
    .first(MOVIE_WITH_RATING_COLUMNS)

  if (!row) return null
  const summary = toMovieSummary(row)
  if (!summary) return null

  return {
    ...summary,
    isAdult: Boolean(row.is_adult),
    endYear: row.end_year,
  }
}

/**
 * Returns the number of rows in the movies table.
 */
export async function getMovieCount(this: DatabaseService): Promise<number> {
  const result = await this.knex('movies').count('* as count').first()
  return Number(result?.count || 0)
}
