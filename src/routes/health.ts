import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Reports database connectivity and whether the dataset schema has been migrated. Returns 503 when either check fails.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const timestamp = new Date().toISOString()
      const checks: HealthCheckResponse['checks'] = {
        database: 'ok',
        schema: 'unknown',
      }

      try {
        await fastify.db.knex.raw('SELECT 1')
      } catch (error) {
        fastify.log.error(
          { error },
          'Health check failed: database connectivity error',
        )
        checks.database = 'failed'
      }

      if (checks.database === 'ok') {
        try {
          checks.schema = (await fastify.db.knex.schema.hasTable('movies'))
            ? 'ok'
            : 'missing'
        } catch (error) {
          fastify.log.error({ error }, 'Health check failed: schema lookup')
        }
      }

      const isHealthy = checks.database === 'ok' && checks.schema === 'ok'

      return reply.status(isHealthy ? 200 : 503).send({
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp,
        checks,
      })
    },
  )
}

export default plugin
