import {
  DatasetStatsResponseSchema,
  ErrorSchema,
} from '@schemas/stats/stats.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'Get dataset statistics',
        operationId: 'getDatasetStats',
        description:
          'Row counts of people, movies, ratings and principals, and the most recent import run',
        response: {
          200: DatasetStatsResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Statistics'],
      },
    },
    async (request, reply) => {
      try {
        const stats = await fastify.movies.getDatasetStats()
        return { success: true, stats }
      } catch (err) {
        logRouteError(request.log, request, err, {
          message: 'Failed to load dataset statistics',
        })
        return reply.internalServerError('Unable to load dataset statistics')
      }
    },
  )
}

export default plugin
