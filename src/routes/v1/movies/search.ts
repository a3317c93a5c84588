import {
  ErrorSchema,
  MovieSearchQuerySchema,
  MovieSearchResponseSchema,
} from '@schemas/movies/movies.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/search',
    {
      schema: {
        summary: 'Search movies by title',
        operationId: 'searchMovies',
        description:
          'Case-insensitive substring match on primary and original titles, ordered by primary title. A blank query returns no results.',
        querystring: MovieSearchQuerySchema,
        response: {
          200: MovieSearchResponseSchema,
          400: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Movies'],
      },
    },
    async (request, reply) => {
      const { q, limit } = request.query
      const query = q.trim()

      try {
        const movies = await fastify.movies.searchMovies(query, limit)
        return {
          success: true,
          query,
          count: movies.length,
          movies,
        }
      } catch (err) {
        logRouteError(request.log, request, err, {
          message: 'Failed to search movies',
          context: { query, limit },
        })
        return reply.internalServerError('Unable to search movies')
      }
    },
  )
}

export default plugin
