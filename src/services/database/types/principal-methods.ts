import type { InsertPrincipal, MovieCredit } from '@root/types/imdb.types.js'
import type { Knex } from 'knex'

declare module '@services/database.service.js' {
  interface DatabaseService {
    // PRINCIPALS
    /**
     * Inserts principals, skipping rows already present.
     */
    insertPrincipals(
      principals: InsertPrincipal[],
      trx: Knex.Transaction,
    ): Promise<void>

    /**
     * Credits of one movie in the given categories, ordered by billing.
     */
    getMovieCredits(
      tconst: string,
      categories: readonly string[],
      limit?: number,
    ): Promise<MovieCredit[]>

    getPrincipalCount(): Promise<number>
  }
}
