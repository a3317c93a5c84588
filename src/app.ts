import path from 'node:path'
import { fileURLToPath } from 'node:url'
import fastifyAutoload from '@fastify/autoload'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'

const appDir = path.dirname(fileURLToPath(import.meta.url))

/**
 * Registers plugins and routes.
 *
 * External plugins (config, security headers, rate limiting, OpenAPI) load
 * first; custom plugins (database, services, error handlers) and routes
 * follow.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions,
) {
  // Load external plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(appDir, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load custom plugins
  fastify.register(fastifyAutoload, {
    dir: path.join(appDir, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load routes
  fastify.register(fastifyAutoload, {
    dir: path.join(appDir, 'routes'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })
}
