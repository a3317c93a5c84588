/**
 * Movie Service
 *
 * Read-only query layer over the imported datasets: title search, movie
 * detail with credits, and dataset statistics.
 */
import {
  ACTOR_CATEGORIES,
  DIRECTOR_CATEGORY,
  isTconst,
  type MovieDetail,
  type MovieSummary,
} from '@root/types/imdb.types.js'
import type { DatasetStatistics } from '@root/types/import.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export const DEFAULT_SEARCH_LIMIT = 50
export const MAX_SEARCH_LIMIT = 200
export const DEFAULT_CAST_LIMIT = 10

export interface MovieServiceOptions {
  /** Results returned when a search names no limit */
  searchLimit: number
  /** Actors listed on a movie detail */
  castLimit: number
}

export class MovieService {
  private readonly options: MovieServiceOptions

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'MOVIES')
  }

  constructor(
    private readonly db: DatabaseService,
    private readonly baseLog: FastifyBaseLogger,
    options: Partial<MovieServiceOptions> = {},
  ) {
    this.options = {
      searchLimit: options.searchLimit ?? DEFAULT_SEARCH_LIMIT,
      castLimit: options.castLimit ?? DEFAULT_CAST_LIMIT,
    }
  }

  /**
   * Finds movies whose primary or original title contains `query`,
   * ignoring case.
   *
   * A blank query returns no results without touching the database.
   *
   * @param query - Search text; surrounding whitespace is ignored
   * @param limit - Maximum results, clamped to 1..200
   */
  async searchMovies(query: string, limit?: number): Promise<MovieSummary[]> {
    const term = query.trim()
    if (!term) return []

    const requested =
      limit !== undefined && Number.isFinite(limit)
        ? limit
        : this.options.searchLimit
    const effectiveLimit = Math.min(
      Math.max(Math.trunc(requested), 1),
      MAX_SEARCH_LIMIT,
    )
    const movies = await this.db.searchMovies(term, effectiveLimit)
    this.log.debug(
      `Search "${term}" matched ${movies.length} movie(s) (limit ${effectiveLimit})`,
    )
    return movies
  }

  /**
   * Loads a movie with its rating, directors and top-billed actors.
   *
   * @returns The detail, or null when no movie has this tconst
   */
  async getMovieDetail(tconst: string): Promise<MovieDetail | null> {
    if (!isTconst(tconst)) return null

    const movie = await this.db.getMovie(tconst)
    if (!movie) return null

    const directors = await this.db.getMovieCredits(tconst, [
      DIRECTOR_CATEGORY,
    ])
    const actors = await this.db.getMovieCredits(
      tconst,
      ACTOR_CATEGORIES,
      this.options.castLimit,
    )

    return { ...movie, directors, actors }
  }

  /**
   * Row counts of every dataset plus the most recent import run.
   */
  async getDatasetStats(): Promise<DatasetStatistics> {
    const [counts, lastImport] = await Promise.all([
      this.db.getDatasetCounts(),
      this.db.getLatestImportRun(),
    ])
    return { counts, lastImport }
  }
}
