import type { MovieDetail } from '@root/types/imdb.types.js'
import {
  ErrorSchema,
  MovieDetailResponseSchema,
  MovieParamsSchema,
} from '@schemas/movies/movies.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/:tconst',
    {
      schema: {
        summary: 'Get movie detail',
        operationId: 'getMovieDetail',
        description:
          'Movie with its rating, directors and top-billed actors, each ordered by billing.',
        params: MovieParamsSchema,
        response: {
          200: MovieDetailResponseSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Movies'],
      },
    },
    async (request, reply) => {
      const { tconst } = request.params

      let movie: MovieDetail | null
      try {
        movie = await fastify.movies.getMovieDetail(tconst)
      } catch (err) {
        logRouteError(request.log, request, err, {
          message: 'Failed to load movie detail',
          tconst,
        })
        return reply.internalServerError('Unable to load movie')
      }

      if (!movie) {
        return reply.status(404).send({
          statusCode: 404,
          code: 'NOT_FOUND',
          error: 'Not Found',
          message: `Movie ${tconst} not found`,
        })
      }

      return { success: true, movie }
    },
  )
}

export default plugin
