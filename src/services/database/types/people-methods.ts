import type { InsertPerson, PersonLookup } from '@root/types/imdb.types.js'
import type { Knex } from 'knex'

declare module '@services/database.service.js' {
  interface DatabaseService {
    // PEOPLE
    /**
     * Inserts people, skipping any nconst already present.
     */
    insertPeople(people: InsertPerson[], trx: Knex.Transaction): Promise<void>

    /**
     * Returns the subset of the given nconsts present in the people table.
     */
    getExistingNconsts(
      nconsts: string[],
      trx?: Knex.Transaction,
    ): Promise<Set<string>>

    /**
     * Looks up a single person by nconst.
     */
    getPerson(nconst: string): Promise<PersonLookup | null>

    getPeopleCount(): Promise<number>
  }
}
