import fastifyRateLimit from '@fastify/rate-limit'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import fp from 'fastify-plugin'

const createRateLimitConfig = (fastify: FastifyInstance) => {
  return {
    max: fastify.config.rateLimitMax,
    timeWindow: '1 minute',
    // Orchestrator probes and the API reference are never throttled
    allowList: (req: FastifyRequest) => {
      const pathname = req.url.split('?')[0]
      return pathname === '/health' || pathname.startsWith('/api/docs')
    },
  }
}

/**
 * Low overhead rate limiter for routes. Also provides `fastify.rateLimit()`
 * used by the not-found handler.
 *
 * @see {@link https://github.com/fastify/fastify-rate-limit}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(fastifyRateLimit, createRateLimitConfig(fastify))
  },
  {
    name: 'rate-limit',
    dependencies: ['config'],
  },
)
