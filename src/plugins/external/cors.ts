import type { FastifyCorsOptions } from '@fastify/cors'
import cors from '@fastify/cors'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Builds the allowed origins from the configured base URL. Localhost
 * deployments also accept the loopback address on the configured port.
 */
export const createCorsConfig = (fastify: FastifyInstance): FastifyCorsOptions => {
  const urlObject = new URL(fastify.config.baseUrl)
  const { protocol, hostname } = urlObject
  const port = fastify.config.port
  const isLocal = hostname === 'localhost' || hostname === '127.0.0.1'

  const origins = isLocal
    ? [`http://localhost:${port}`, `http://127.0.0.1:${port}`]
    : [`${protocol}//${hostname}`, `${protocol}//${hostname}:${port}`]

  return {
    origin: origins,
    methods: ['GET', 'HEAD', 'OPTIONS'],
    allowedHeaders: ['Origin', 'X-Requested-With', 'Content-Type', 'Accept'],
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(cors, createCorsConfig(fastify))
  },
  {
    name: 'cors',
    dependencies: ['config'],
  },
)
