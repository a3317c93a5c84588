import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

export interface RouteErrorOptions {
  /** Log message; defaults to `Error in route <METHOD> <url>` */
  message?: string
  level?: 'error' | 'warn' | 'info'
  /** Extra fields merged into the log object */
  context?: Record<string, unknown>
  [field: string]: unknown
}

/**
 * Logs an error caught inside a route handler with the route it came from.
 *
 * The route is the registered pattern when known (`/v1/movies/:tconst`),
 * otherwise the raw URL.
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  options: RouteErrorOptions = {},
): void {
  const { message, level = 'error', context, ...fields } = options
  const route = `${request.method} ${request.routeOptions?.url ?? request.url}`

  const logObject: Record<string, unknown> = {
    error,
    route,
    ...fields,
    ...context,
  }

  log[level](logObject, message ?? `Error in route ${route}`)
}
