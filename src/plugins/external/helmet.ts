import type { FastifyHelmetOptions } from '@fastify/helmet'
import helmet from '@fastify/helmet'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

// JSON API only; the API reference page needs inline scripts, so no CSP
const createHelmetConfig = (): FastifyHelmetOptions => ({
  global: true,
  contentSecurityPolicy: false,
  crossOriginEmbedderPolicy: false,
  hsts: false,
  hidePoweredBy: true,
  noSniff: true,
  dnsPrefetchControl: {
    allow: false,
  },
  frameguard: {
    action: 'deny',
  },
})

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(helmet, createHelmetConfig())
  },
  {
    name: 'helmet-plugin',
    dependencies: ['config'],
  },
)
