import { copyFile, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'
import { gzipSync } from 'node:zlib'
import { ImportFileError } from '@root/types/errors.js'
import type { DatabaseService } from '@services/database.service.js'
import { ImdbImportService } from '@services/imdb-import.service.js'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  createTestDatabaseService,
  getTestDatabase,
  resetDatabase,
} from '../../helpers/database.js'
import { createMockLogger } from '../../mocks/logger.js'

const FIXTURE_DIR = resolve('test/fixtures/imdb')
const FIXTURE_FILES = [
  'name.basics.tsv',
  'title.basics.tsv',
  'title.ratings.tsv',
  'title.principals.tsv',
]

describe('ImdbImportService', () => {
  let db: DatabaseService
  let importer: ImdbImportService
  let workDir: string

  beforeEach(async () => {
    db = await createTestDatabaseService(createMockLogger())
    await resetDatabase()
    importer = new ImdbImportService(db, createMockLogger())
    workDir = await mkdtemp(join(tmpdir(), 'marquee-import-'))
  })

  afterEach(async () => {
    await db.close()
    await rm(workDir, { recursive: true, force: true })
  })

  async function copyFixtures(
    transform: (name: string, content: Buffer) => [string, Buffer] = (
      name,
      content,
    ) => [name, content],
  ): Promise<void> {
    for (const name of FIXTURE_FILES) {
      const [target, content] = transform(
        name,
        await readFile(join(FIXTURE_DIR, name)),
      )
      await writeFile(join(workDir, target), content)
    }
  }

  describe('importDirectory', () => {
    it('should report per-dataset statistics', async () => {
      const result = await importer.importDirectory(FIXTURE_DIR)

      expect(result.directory).toBe(FIXTURE_DIR)
      expect(result.summary).toEqual({
        people: {
          processed: 7,
          inserted: 5,
          skippedMalformed: 2,
          skippedMissingReference: 0,
          failed: 0,
        },
        movies: {
          processed: 7,
          inserted: 5,
          skippedMalformed: 2,
          skippedMissingReference: 0,
          failed: 0,
        },
        ratings: {
          processed: 5,
          inserted: 3,
          skippedMalformed: 1,
          skippedMissingReference: 1,
          failed: 0,
        },
        principals: {
          processed: 11,
          inserted: 7,
          skippedMalformed: 1,
          skippedMissingReference: 2,
          failed: 0,
        },
      })
    })

    it('should load a person row with its years and professions', async () => {
      await importer.importDirectory(FIXTURE_DIR)

      expect(await db.getPerson('nm0000001')).toEqual({
        nconst: 'nm0000001',
        primaryName: 'Nikola Tesla',
        birthYear: 1856,
        deathYear: 1943,
        primaryProfessions: ['inventor'],
      })
    })

    it('should store a \\N runtime as null', async () => {
      await importer.importDirectory(FIXTURE_DIR)

      const movie = await db.getMovie('tt0000002')
      expect(movie?.runtimeMinutes).toBeNull()
    })

    it('should clean movie fields', async () => {
      await importer.importDirectory(FIXTURE_DIR)

      expect(await db.getMovie('tt0000005')).toMatchObject({
        originalTitle: 'Quiet Harbour',
        runtimeMinutes: null,
        genres: [],
        rating: null,
      })
      expect(await db.getMovie('tt0000004')).toMatchObject({
        isAdult: true,
        genres: ['Drama', 'Romance'],
        rating: { averageRating: null, numVotes: 0 },
      })
    })

    it('should not duplicate rows when run twice', async () => {
      await importer.importDirectory(FIXTURE_DIR)
      const countsAfterFirst = await db.getDatasetCounts()

      const second = await importer.importDirectory(FIXTURE_DIR)

      expect(await db.getDatasetCounts()).toEqual(countsAfterFirst)
      expect(countsAfterFirst).toEqual({
        people: 5,
        movies: 5,
        ratings: 3,
        principals: 7,
      })
      for (const stats of Object.values(second.summary)) {
        expect(stats.inserted).toBe(0)
        expect(stats.failed).toBe(0)
      }
    })

    it('should only keep ratings and principals with existing references', async () => {
      await importer.importDirectory(FIXTURE_DIR)
      const knex = getTestDatabase()

      const orphanRatings = await knex('ratings')
        .leftJoin('movies', 'movies.tconst', 'ratings.tconst')
        .whereNull('movies.tconst')
        .count('* as count')
        .first()
      const orphanPrincipals = await knex('principals')
        .leftJoin('movies', 'movies.tconst', 'principals.tconst')
        .leftJoin('people', 'people.nconst', 'principals.nconst')
        .whereNull('movies.tconst')
        .orWhereNull('people.nconst')
        .count('* as count')
        .first()

      expect(Number(orphanRatings?.count)).toBe(0)
      expect(Number(orphanPrincipals?.count)).toBe(0)
    })

    it('should give the same result with small batches', async () => {
      const result = await importer.importDirectory(FIXTURE_DIR, {
        batchSize: 2,
      })

      expect(result.summary.principals).toEqual({
        processed: 11,
        inserted: 7,
        skippedMalformed: 1,
        skippedMissingReference: 2,
        failed: 0,
      })
      expect(await db.getDatasetCounts()).toEqual({
        people: 5,
        movies: 5,
        ratings: 3,
        principals: 7,
      })
    })

    it('should count a failed batch and keep loading', async () => {
      vi.spyOn(db, 'insertMovies').mockRejectedValueOnce(new Error('boom'))

      const result = await importer.importDirectory(FIXTURE_DIR, {
        batchSize: 2,
      })

      expect(result.summary.movies).toEqual({
        processed: 7,
        inserted: 3,
        skippedMalformed: 2,
        skippedMissingReference: 0,
        failed: 2,
      })
      expect(result.summary.ratings).toEqual({
        processed: 5,
        inserted: 1,
        skippedMalformed: 1,
        skippedMissingReference: 3,
        failed: 0,
      })
      expect(result.summary.principals).toEqual({
        processed: 11,
        inserted: 0,
        skippedMalformed: 1,
        skippedMissingReference: 10,
        failed: 0,
      })
      expect(
        await getTestDatabase()('movies').orderBy('tconst').pluck('tconst'),
      ).toEqual(['tt0000003', 'tt0000004', 'tt0000005'])
      expect((await db.getLatestImportRun())?.status).toBe('completed')
    })

    it('should read gzip-compressed datasets', async () => {
      await copyFixtures((name, content) => [`${name}.gz`, gzipSync(content)])

      const result = await importer.importDirectory(workDir)

      expect(result.summary.movies.inserted).toBe(5)
      expect(result.summary.principals.inserted).toBe(7)
    })

    it('should prefer the plain file when both forms exist', async () => {
      await copyFixtures()
      await writeFile(
        join(workDir, 'title.ratings.tsv.gz'),
        gzipSync('tconst\taverageRating\tnumVotes\n'),
      )

      const result = await importer.importDirectory(workDir)

      expect(result.summary.ratings.inserted).toBe(3)
    })

    it('should fail before writing anything when a dataset file is missing', async () => {
      await copyFixtures()
      await rm(join(workDir, 'title.principals.tsv'))

      const error = await importer
        .importDirectory(workDir)
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ImportFileError)
      expect(error).toMatchObject({
        dataset: 'principals',
        filePath: join(workDir, 'title.principals.tsv'),
        message: `Missing principals dataset: expected title.principals.tsv or title.principals.tsv.gz in ${workDir}`,
      })
      expect(await db.getDatasetCounts()).toEqual({
        people: 0,
        movies: 0,
        ratings: 0,
        principals: 0,
      })
      expect(await db.getLatestImportRun()).toBeNull()
    })

    it('should fail the run when a header lacks a required column', async () => {
      await copyFixtures((name, content) =>
        name === 'title.ratings.tsv'
          ? [name, Buffer.from('tconst\taverageRating\ntt0000001\t8.1\n')]
          : [name, content],
      )

      await expect(importer.importDirectory(workDir)).rejects.toThrow(
        `${join(workDir, 'title.ratings.tsv')}: Header is missing required column(s): numVotes`,
      )

      const run = await db.getLatestImportRun()
      expect(run?.status).toBe('failed')
      expect(run?.error).toBe(
        `${join(workDir, 'title.ratings.tsv')}: Header is missing required column(s): numVotes`,
      )
      expect(run?.summary?.movies.inserted).toBe(5)
      expect(run?.summary?.ratings.processed).toBe(0)
    })

    it('should fail when a dataset file is empty', async () => {
      await copyFixtures((name, content) =>
        name === 'name.basics.tsv' ? [name, Buffer.alloc(0)] : [name, content],
      )

      await expect(importer.importDirectory(workDir)).rejects.toBeInstanceOf(
        ImportFileError,
      )
    })

    it('should record a completed run with its summary', async () => {
      const result = await importer.importDirectory(FIXTURE_DIR)

      const run = await db.getLatestImportRun()
      expect(run).toMatchObject({
        id: result.runId,
        directory: FIXTURE_DIR,
        status: 'completed',
        error: null,
        summary: result.summary,
      })
      expect(run?.finishedAt).not.toBeNull()
    })
  })
})
