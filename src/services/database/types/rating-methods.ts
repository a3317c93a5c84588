import type { WeightedTitleRow } from '@root/types/database-rows.types.js'
import type { InsertRating } from '@root/types/imdb.types.js'
import type { Knex } from 'knex'

declare module '@services/database.service.js' {
  interface DatabaseService {
    // RATINGS
    /**
     * Inserts ratings, skipping any movie that already has one.
     */
    insertRatings(ratings: InsertRating[], trx: Knex.Transaction): Promise<void>

    /**
     * Titles of rated movies with at least one vote, with their vote counts.
     */
    getVoteWeightedTitles(): Promise<WeightedTitleRow[]>

    getRatingCount(): Promise<number>
  }
}
