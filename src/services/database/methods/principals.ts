import type { CreditRow } from '@root/types/database-rows.types.js'
import type { InsertPrincipal, MovieCredit } from '@root/types/imdb.types.js'
import { isNconst } from '@root/types/imdb.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { parseJsonList, toJsonList } from '@utils/json-list.js'
import type { Knex } from 'knex'

/**
 * Inserts principals, skipping rows already present under the
 * (tconst, nconst, ordering, category) key.
 *
 * Callers must have filtered out principals whose movie or person does not exist.
 */
export async function insertPrincipals(
  this: DatabaseService,
  principals: InsertPrincipal[],
  trx: Knex.Transaction,
): Promise<void> {
  const rows = principals.map((principal) => ({
    ...principal,
    characters: toJsonList(principal.characters),
  }))
  await this.insertIgnoringConflicts(trx, 'principals', rows, [
    'tconst',
    'nconst',
    'ordering',
    'category',
  ])
}

/**
 * Credits of one movie in the given categories, joined with the person's
 * name and ordered by billing.
 *
 * @param tconst - Movie identifier
 * @param categories - Principal categories to include (e.g. ['director'])
 * @param limit - Optional cap on the number of credits
 */
export async function getMovieCredits(
  this: DatabaseService,
  tconst: string,
  categories: readonly string[],
  limit?: number,
): Promise<MovieCredit[]> {
  if (categories.length === 0) return []

  const query = this.knex('principals')
    .join('people', 'people.nconst', 'principals.nconst')
    .where('principals.tconst', tconst)
    .whereIn('principals.category', [...categories])
    .orderBy([
      { column: 'principals.ordering', order: 'asc' },
      { column: 'principals.nconst', order: 'asc' },
    ])
    .select(
      'principals.nconst',
      'people.primary_name',
      'principals.ordering',
      'principals.category',
      'principals.job',
      'principals.characters',
    )

  if (limit !== undefined) {
    query.limit(limit)
  }

  const rows: CreditRow[] = await query
  return rows.flatMap((row) => {
    if (!isNconst(row.nconst)) return []
    return [
      {
        nconst: row.nconst,
        name: row.primary_name,
        ordering: row.ordering,
        category: row.category,
        job: row.job,
        characters: parseJsonList(row.characters),
      },
    ]
  })
}

/**
 * Returns the number of rows in the principals table.
 */
export async function getPrincipalCount(
  this: DatabaseService,
): Promise<number> {
  const result = await this.knex('principals').count('* as count').first()
  return Number(result?.count || 0)
}
