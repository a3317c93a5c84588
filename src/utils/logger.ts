import fs from 'node:fs'
import { resolveEnvPath, resolveLogPath } from '@utils/data-dir.js'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, Logger, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface StreamLoggerOptions extends LoggerOptions {
  stream: pino.DestinationStream
}

type MarqueeLoggerOptions = LoggerOptions | StreamLoggerOptions

type SerializableError =
  | Error
  | Record<string, unknown>
  | string
  | number
  | boolean
  | null
  | undefined

const PRETTY_OPTIONS = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

const SENSITIVE_QUERY_PARAMS = ['apiKey', 'password', 'token']

// Load .env file early for logger configuration
config({ path: resolveEnvPath() })

function toSerializable(value: unknown): SerializableError {
  if (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Error
  ) {
    return value
  }
  if (typeof value === 'object') {
    return { ...value }
  }
  return String(value)
}

/**
 * Creates an error serializer that handles standard errors, plain objects and primitives.
 *
 * Stack traces are dropped for 4xx errors; `cause` chains are serialized recursively.
 */
export function createErrorSerializer() {
  const serialize = (
    err: SerializableError,
  ): Record<string, unknown> | null | undefined => {
    if (err === null || err === undefined) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const source: Record<string, unknown> = { ...err }
    const serialized: Record<string, unknown> = {}

    // message, name and stack are non-enumerable on Error instances
    const message = 'message' in err ? err.message : undefined
    const name = 'name' in err ? err.name : undefined
    if (message) serialized.message = message
    if (name) serialized.name = name
    if (source.status !== undefined) serialized.status = source.status
    if (source.statusCode !== undefined)
      serialized.statusCode = source.statusCode

    if (err instanceof Error) {
      serialized.type = err.constructor.name || 'Error'
    } else if (typeof name === 'string' && name) {
      serialized.type = name
    } else {
      serialized.type = 'UnknownError'
    }

    const statusCode =
      typeof source.statusCode === 'number'
        ? source.statusCode
        : typeof source.status === 'number'
          ? source.status
          : undefined
    const stack = 'stack' in err ? err.stack : undefined
    if (stack && (!statusCode || statusCode >= 500)) {
      serialized.stack = stack
    }

    const cause = 'cause' in err ? err.cause : undefined
    if (cause) {
      serialized.cause = serialize(toSerializable(cause))
    }

    for (const key of Object.keys(source)) {
      if (
        !['message', 'stack', 'name', 'status', 'statusCode', 'type'].includes(
          key,
        )
      ) {
        serialized[key] = source[key]
      }
    }

    return serialized
  }

  return serialize
}

/**
 * Returns a serializer for Fastify requests that redacts sensitive query parameters from the URL.
 */
export function createRequestSerializer() {
  return (req: FastifyRequest) => {
    let url = req.url
    for (const param of SENSITIVE_QUERY_PARAMS) {
      url = url.replace(
        new RegExp(`([?&])${param}=([^&]+)`, 'gi'),
        `$1${param}=[REDACTED]`,
      )
    }

    return {
      method: req.method,
      url,
      host: req.headers.host,
      remoteAddress: req.ip,
      remotePort: req.socket?.remotePort,
    }
  }
}

/**
 * Generates a log filename for the rotating file stream.
 *
 * Returns 'marquee-current.log' for the active file, otherwise 'marquee-YYYY-MM-DD[-index].log'.
 */
export function filename(time: number | Date | null, index?: number): string {
  if (!time) return 'marquee-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `marquee-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream for logging, ensuring the log directory exists.
 *
 * Falls back to standard output when the directory cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolveLogPath()
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

function getSerializers() {
  return {
    req: createRequestSerializer(),
    error: createErrorSerializer(),
  }
}

/**
 * Resolves where log lines go.
 *
 * Always logs to file; `enableConsoleOutput=false` turns the pretty terminal output off.
 * Returns null when terminal output alone is wanted (file stream fell back to stdout).
 */
function getDestination(): pino.DestinationStream | null {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return fileStream
  }

  // Avoid double-logging if file stream fell back to stdout
  if (fileStream === process.stdout) {
    return null
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: PRETTY_OPTIONS,
  })

  return pino.multistream([{ stream: prettyStream }, { stream: fileStream }])
}

/**
 * Generates Fastify logger options from environment variables.
 */
export function createLoggerConfig(): MarqueeLoggerOptions {
  const destination = getDestination()

  if (!destination) {
    return {
      level: 'info',
      transport: {
        target: 'pino-pretty',
        options: PRETTY_OPTIONS,
      },
      serializers: getSerializers(),
    }
  }

  return {
    level: 'info',
    stream: destination,
    serializers: getSerializers(),
  }
}

/**
 * Standalone logger for command line entry points, writing to the same
 * destinations as the server.
 */
export function createCliLogger(level: LevelWithSilent = 'info'): Logger {
  const destination = getDestination()
  const options: LoggerOptions = { level, serializers: getSerializers() }

  if (!destination) {
    return pino({
      ...options,
      transport: { target: 'pino-pretty', options: PRETTY_OPTIONS },
    })
  }
  return pino(options, destination)
}

/**
 * Creates a child logger whose messages are prefixed with `[SERVICE] `
 */
export function createServiceLogger(
  log: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return log.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
