import { resolve } from 'node:path'
import type { ErrorResponse } from '@schemas/common/error.schema.js'
import type {
  MovieDetailResponse,
  MovieSearchResponse,
} from '@schemas/movies/movies.schema.js'
import { ImdbImportService } from '@services/imdb-import.service.js'
import type { FastifyInstance } from 'fastify'
import pino from 'pino'
import type { TestContext } from 'vitest'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { build } from '../../../helpers/app.js'
import { expectValidationError } from '../../../helpers/assertions.js'
import {
  initializeTestDatabase,
  resetDatabase,
} from '../../../helpers/database.js'

async function buildWithData(ctx: TestContext): Promise<FastifyInstance> {
  const app = await build(ctx)
  await new ImdbImportService(app.db, app.log).importDirectory(
    resolve('test/fixtures/imdb'),
  )
  return app
}

describe('Movie routes', () => {
  beforeEach(async () => {
    await initializeTestDatabase()
    await resetDatabase()
  })

  describe('GET /v1/movies/search', () => {
    it('should return matching movies with the trimmed query', async (ctx) => {
      const app = await buildWithData(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/v1/movies/search?q=%20harbor%20',
      })

      expect(response.statusCode).toBe(200)
      const body = response.json<MovieSearchResponse>()
      expect(body.success).toBe(true)
      expect(body.query).toBe('harbor')
      expect(body.count).toBe(2)
      expect(body.movies.map((movie) => movie.primaryTitle)).toEqual([
        'Harbor Lights',
        'The Silent Harbor',
      ])
      expect(body.movies[1]?.rating).toEqual({
        averageRating: 8.1,
        numVotes: 3000,
      })
    })

    it('should honour the limit parameter', async (ctx) => {
      const app = await buildWithData(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/v1/movies/search?q=harbo&limit=1',
      })

      expect(response.statusCode).toBe(200)
      expect(
        response.json<MovieSearchResponse>().movies.map((m) => m.tconst),
      ).toEqual(['tt0000002'])
    })

    it('should return an empty list without a query', async (ctx) => {
      const app = await buildWithData(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/v1/movies/search',
      })

      expect(response.statusCode).toBe(200)
      expect(response.json<MovieSearchResponse>()).toEqual({
        success: true,
        query: '',
        count: 0,
        movies: [],
      })
    })

    it('should reject a limit outside 1 to 200', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/v1/movies/search?q=harbor&limit=0',
      })

      expect(response.statusCode).toBe(400)
      expect(response.json<ErrorResponse>()).toMatchObject({
        statusCode: 400,
        code: 'FST_ERR_VALIDATION',
        error: 'Bad Request',
      })
    })

    it('should return a generic 500 when the search fails', async (ctx) => {
      const app = await build(ctx)
      vi.spyOn(app.movies, 'searchMovies').mockRejectedValue(
        new Error('no such table: movies'),
      )

      const response = await app.inject({
        method: 'GET',
        url: '/v1/movies/search?q=harbor',
      })

      expect(response.statusCode).toBe(500)
      expect(response.json<ErrorResponse>()).toEqual({
        statusCode: 500,
        code: 'GENERIC_ERROR',
        error: 'Internal Server Error',
        message: 'Internal Server Error',
      })
    })

    it('should log a failed search on the request logger', async (ctx) => {
      const lines: string[] = []
      const app = await build(ctx, {
        loggerInstance: pino(
          { level: 'error' },
          { write: (line: string) => lines.push(line) },
        ),
      })
      vi.spyOn(app.movies, 'searchMovies').mockRejectedValue(
        new Error('no such table: movies'),
      )

      await app.inject({
        method: 'GET',
        url: '/v1/movies/search?q=harbor',
      })

      const entries: unknown[] = lines.map((line) => JSON.parse(line))
      expect(entries).toContainEqual(
        expect.objectContaining({
          msg: 'Failed to search movies',
          route: 'GET /v1/movies/search',
          query: 'harbor',
          reqId: expect.any(String),
        }),
      )
    })
  })

  describe('GET /v1/movies/:tconst', () => {
    it('should return the movie with its credits', async (ctx) => {
      const app = await buildWithData(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/v1/movies/tt0000002',
      })

      expect(response.statusCode).toBe(200)
      const body = response.json<MovieDetailResponse>()
      expect(body.success).toBe(true)
      expect(body.movie).toEqual({
        tconst: 'tt0000002',
        titleType: 'movie',
        primaryTitle: 'Harbor Lights',
        originalTitle: 'Harbor Lights',
        startYear: 2001,
        runtimeMinutes: null,
        genres: ['Comedy'],
        rating: { averageRating: 6.4, numVotes: 1000 },
        isAdult: false,
        endYear: null,
        directors: [
          {
            nconst: 'nm0000003',
            name: 'Bo Sample',
            ordering: 2,
            category: 'director',
            job: null,
            characters: [],
          },
        ],
        actors: [
          {
            nconst: 'nm0000002',
            name: 'Ada Example',
            ordering: 1,
            category: 'actress',
            job: null,
            characters: ['Lena'],
          },
        ],
      })
    })

    it('should return 404 for an unknown movie', async (ctx) => {
      const app = await buildWithData(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/v1/movies/tt7654321',
      })

      expect(response.statusCode).toBe(404)
      expect(response.json<ErrorResponse>()).toEqual({
        statusCode: 404,
        code: 'NOT_FOUND',
        error: 'Not Found',
        message: 'Movie tt7654321 not found',
      })
    })

    it('should reject identifiers that are not title ids', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/v1/movies/nm0000001',
      })

      expectValidationError(
        response.statusCode,
        response.payload,
        'Expected an IMDb title id such as tt0000001',
      )
    })
  })
})
