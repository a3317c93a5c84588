import fastifySwagger from '@fastify/swagger'
import apiReference from '@scalar/fastify-api-reference'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'

const createOpenapiConfig = (fastify: FastifyInstance) => {
  fastify.log.debug(
    `Configuring Swagger with base URL: ${fastify.config.baseUrl}`,
  )

  return {
    openapi: {
      info: {
        title: 'Marquee API',
        description:
          'Read-only search and detail lookups over imported IMDb datasets',
        version: 'V1',
      },
      servers: [
        {
          url: fastify.config.baseUrl,
          description: 'Primary Server',
        },
        {
          url: `http://localhost:${fastify.config.port}`,
          description: 'Localhost Access (with port)',
        },
      ],
      tags: [
        {
          name: 'Movies',
          description: 'Title search and detail endpoints',
        },
        {
          name: 'Statistics',
          description: 'Dataset statistics endpoints',
        },
        {
          name: 'System',
          description: 'Health and status endpoints',
        },
      ],
    },
    hideUntagged: true,
    transform: jsonSchemaTransform,
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    // Set up Zod validators
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))

    await fastify.register(apiReference, {
      routePrefix: '/api/docs',
    })
  },
  {
    name: 'swagger',
    dependencies: ['config'],
  },
)
