import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'
import { QuerySetError } from '@root/types/errors.js'
import type { DatabaseService } from '@services/database.service.js'
import { ImdbImportService } from '@services/imdb-import.service.js'
import { QuerySetService } from '@services/query-set.service.js'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  createTestDatabaseService,
  resetDatabase,
} from '../../helpers/database.js'
import { createMockLogger } from '../../mocks/logger.js'

function sequence(values: number[]): () => number {
  let index = 0
  return () => values[index++ % values.length] ?? 0
}

describe('QuerySetService', () => {
  let db: DatabaseService
  let workDir: string

  beforeEach(async () => {
    db = await createTestDatabaseService(createMockLogger())
    await resetDatabase()
    workDir = await mkdtemp(join(tmpdir(), 'marquee-queries-'))
  })

  afterEach(async () => {
    await db.close()
    await rm(workDir, { recursive: true, force: true })
  })

  it('should fail when no rated movie has votes', async () => {
    const generator = new QuerySetService(db, createMockLogger())

    await expect(
      generator.generate({ output: join(workDir, 'queries.txt') }),
    ).rejects.toThrow(
      new QuerySetError(
        'No rated movies with votes found. Import the IMDb datasets first.',
      ),
    )
  })

  describe('with imported data', () => {
    beforeEach(async () => {
      await new ImdbImportService(db, createMockLogger()).importDirectory(
        resolve('test/fixtures/imdb'),
      )
    })

    it('should write titles weighted by votes, one per line', async () => {
      // Candidates in tconst order: The Silent Harbor (3000), Harbor Lights (1000)
      const generator = new QuerySetService(
        db,
        createMockLogger(),
        sequence([0, 0.5, 0.75, 0.99]),
      )
      const output = join(workDir, 'nested', 'queries.txt')

      const result = await generator.generate({ output, count: 4 })

      expect(result).toEqual({ outputPath: output, count: 4, candidates: 2 })
      expect(await readFile(output, 'utf8')).toBe(
        'The Silent Harbor\nThe Silent Harbor\nHarbor Lights\nHarbor Lights\n',
      )
    })

    it('should never draw movies without votes', async () => {
      const generator = new QuerySetService(db, createMockLogger())
      const output = join(workDir, 'queries.txt')

      await generator.generate({ output, count: 200 })

      const titles = new Set(
        (await readFile(output, 'utf8')).trimEnd().split('\n'),
      )
      for (const title of titles) {
        expect(['The Silent Harbor', 'Harbor Lights']).toContain(title)
      }
    })

    it('should reject a count below one', async () => {
      const generator = new QuerySetService(db, createMockLogger())

      await expect(
        generator.generate({ output: join(workDir, 'q.txt'), count: 0 }),
      ).rejects.toThrow('Query count must be a positive integer, got 0')
    })
  })
})
