import type {
  InsertMovie,
  MovieDetail,
  MovieSummary,
} from '@root/types/imdb.types.js'
import type { Knex } from 'knex'

declare module '@services/database.service.js' {
  interface DatabaseService {
    // MOVIES
    /**
     * Inserts movies, skipping any tconst already present.
     */
    insertMovies(movies: InsertMovie[], trx: Knex.Transaction): Promise<void>

    /**
     * Returns the subset of the given tconsts present in the movies table.
     */
    getExistingTconsts(
      tconsts: string[],
      trx?: Knex.Transaction,
    ): Promise<Set<string>>

    /**
     * Case-insensitive substring search over primary and original titles.
     */
    searchMovies(term: string, limit: number): Promise<MovieSummary[]>

    /**
     * Loads one movie with its rating, without credits.
     */
    getMovie(
      tconst: string,
    ): Promise<Omit<MovieDetail, 'directors' | 'actors'> | null>

    getMovieCount(): Promise<number>
  }
}
