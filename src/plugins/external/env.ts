import env from '@fastify/env'
import type { Config } from '@root/types/config.types.js'
import { configSchema, validateDatabaseConfig } from '@utils/config.js'
import { resolveEnvPath } from '@utils/data-dir.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema: configSchema,
      dotenv: {
        path: resolveEnvPath(),
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    // Validate PostgreSQL configuration for security
    try {
      validateDatabaseConfig(fastify.config, fastify.log)
    } catch (error) {
      fastify.log.error({ error }, 'Invalid database configuration')
      throw error
    }
  },
  {
    name: 'config',
  },
)
