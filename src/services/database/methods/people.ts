import type { PersonRow } from '@root/types/database-rows.types.js'
import type { InsertPerson, PersonLookup } from '@root/types/imdb.types.js'
import { isNconst } from '@root/types/imdb.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { parseJsonList, toJsonList } from '@utils/json-list.js'
import type { Knex } from 'knex'

/**
 * Inserts people, skipping any nconst already present.
 *
 * @param people - Rows parsed from name.basics
 * @param trx - Transaction the batch is written in
 */
export async function insertPeople(
  this: DatabaseService,
  people: InsertPerson[],
  trx: Knex.Transaction,
): Promise<void> {
  const rows = people.map((person) => ({
    ...person,
    primary_professions: toJsonList(person.primary_professions),
  }))
  await this.insertIgnoringConflicts(trx, 'people', rows, ['nconst'])
}

/**
 * Returns the subset of the given nconsts that exist in the people table.
 */
export async function getExistingNconsts(
  this: DatabaseService,
  nconsts: string[],
  trx?: Knex.Transaction,
): Promise<Set<string>> {
  const existing = new Set<string>()
  if (nconsts.length === 0) return existing

  const query: Knex = trx ?? this.knex
  // Stay under SQLite's bound parameter limit
  for (const chunk of this.chunkArray([...new Set(nconsts)], 500)) {
    const rows: Pick<PersonRow, 'nconst'>[] = await query('people')
      .whereIn('nconst', chunk)
      .select('nconst')
    for (const row of rows) existing.add(row.nconst)
  }
  return existing
}

/**
 * Looks up a single person by nconst.
 */
export async function getPerson(
  this: DatabaseService,
  nconst: string,
): Promise<PersonLookup | null> {
  const row = await this.knex<PersonRow>('people').where({ nconst }).first()
  if (!row || !isNconst(row.nconst)) return null

  return {
    nconst: row.nconst,
    primaryName: row.primary_name,
    birthYear: row.birth_year,
    deathYear: row.death_year,
    primaryProfessions: parseJsonList(row.primary_professions),
  }
}

/**
 * Returns the number of rows in the people table.
 */
export async function getPeopleCount(this: DatabaseService): Promise<number> {
  const result = await this.knex('people').count('* as count').first()
  return Number(result?.count || 0)
}
