/**
 * Movies Plugin
 *
 * Provides title search, movie detail and dataset statistics lookups
 */
import { MovieService } from '@services/movie.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    movies: MovieService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const movieService = new MovieService(fastify.db, fastify.log, {
      searchLimit: fastify.config.searchLimit,
      castLimit: fastify.config.detailCastLimit,
    })
    fastify.decorate('movies', movieService)
  },
  {
    name: 'movies',
    dependencies: ['database', 'config'],
  },
)
