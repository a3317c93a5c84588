import type { WeightedTitleRow } from '@root/types/database-rows.types.js'
import type { InsertRating } from '@root/types/imdb.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { Knex } from 'knex'

/**
 * Inserts ratings, skipping any movie that already has one.
 *
 * Callers must have filtered out ratings whose movie does not exist.
 */
export async function insertRatings(
  this: DatabaseService,
  ratings: InsertRating[],
  trx: Knex.Transaction,
): Promise<void> {
  await this.insertIgnoringConflicts(trx, 'ratings', ratings, ['tconst'])
}

/**
 * Primary titles of every rated movie with at least one vote, paired with
 * the vote count. Ordered by tconst so sampling is reproducible.
 */
export async function getVoteWeightedTitles(
  this: DatabaseService,
): Promise<WeightedTitleRow[]> {
  const rows: WeightedTitleRow[] = await this.knex('ratings')
    .join('movies', 'movies.tconst', 'ratings.tconst')
    .where('ratings.num_votes', '>', 0)
    .orderBy('movies.tconst')
    .select('movies.primary_title', 'ratings.num_votes')

  return rows.map((row) => ({
    primary_title: row.primary_title,
    num_votes: Number(row.num_votes),
  }))
}

/**
 * Returns the number of rows in the ratings table.
 */
export async function getRatingCount(this: DatabaseService): Promise<number> {
  const result = await this.knex('ratings').count('* as count').first()
  return Number(result?.count || 0)
}
