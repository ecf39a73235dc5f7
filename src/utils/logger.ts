import fs from 'node:fs'
import { resolve } from 'node:path'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'
import { projectRoot, resolveLogPath } from '@utils/paths.js'

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

export type AppLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

type Serializable = Error | Record<string, unknown> | string | number | boolean

function isSerializable(value: unknown): value is Serializable {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    (typeof value === 'object' && value !== null)
  )
}

/**
 * Serializes errors with their kind, HTTP status and cause chain.
 * Stack traces are dropped for 4xx responses.
 */
function createErrorSerializer() {
  const serialize = (err: Serializable): Record<string, unknown> => {
    if (typeof err !== 'object') {
      return { message: String(err), type: `${typeof err}Error` }
    }

    const serialized: Record<string, unknown> = {}
    const record: Record<string, unknown> = { ...err }

    if (err instanceof Error) {
      serialized.message = err.message
      serialized.name = err.name
      serialized.type = err.constructor.name
    } else {
      if (typeof record.message === 'string') serialized.message = record.message
      serialized.type = typeof record.name === 'string' ? record.name : 'UnknownError'
    }

    if (typeof record.kind === 'string') serialized.kind = record.kind

    const status =
      typeof record.statusCode === 'number'
        ? record.statusCode
        : typeof record.status === 'number'
          ? record.status
          : undefined
    if (status !== undefined) serialized.status = status

    if (err instanceof Error && err.stack && (!status || status >= 500)) {
      serialized.stack = err.stack
    }

    const cause = err instanceof Error ? err.cause : record.cause
    if (isSerializable(cause)) {
      serialized.cause = serialize(cause)
    }

    for (const key of Object.keys(record)) {
      if (!(key in serialized) && !['stack', 'cause', 'statusCode'].includes(key)) {
        serialized[key] = record[key]
      }
    }

    return serialized
  }

  return (err: unknown) => (isSerializable(err) ? serialize(err) : err)
}

/**
 * Request serializer that redacts credentials passed as query parameters.
 */
function createRequestSerializer() {
  return (req: FastifyRequest) => ({
    method: req.method,
    url: req.url
      .replace(/([?&])apiKey=([^&]+)/gi, '$1apiKey=[REDACTED]')
      .replace(/([?&])password=([^&]+)/gi, '$1password=[REDACTED]')
      .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]'),
    host: req.headers.host,
    remoteAddress: req.ip,
    remotePort: req.socket.remotePort,
  })
}

/**
 * Log file name for the given rotation time: podsync-YYYY-MM-DD[-index].log
 */
function filename(time: number | Date, index?: number): string {
  if (!time) return 'podsync-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `podsync-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Rotating file stream under the log directory, or stdout when the directory
 * cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolveLogPath()
  try {
    fs.mkdirSync(logDirectory, { recursive: true })
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

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

/**
 * Builds the Fastify logger options.
 *
 * Logs always go to the rotating file. Environment variables:
 * - enableConsoleOutput: also pretty-print to the terminal (default: true)
 */
export function createLoggerConfig(): AppLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const serializers = {
    req: createRequestSerializer(),
    error: createErrorSerializer(),
    err: createErrorSerializer(),
  }

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return { level: 'info', stream: fileStream, serializers }
  }

  // Avoid double-logging when the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return {
      level: 'info',
      transport: { target: 'pino-pretty', options: prettyOptions },
      serializers,
    }
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  return {
    level: 'info',
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers,
  }
}

/**
 * Derives a component logger whose messages carry a `[NAME]` prefix.
 *
 * @example
 * this.log = createServiceLogger(baseLog, 'SYNC')
 * this.log.info('Pass completed') // "[SYNC] Pass completed"
 */
export function createServiceLogger(
  baseLog: FastifyBaseLogger,
  name: string,
): FastifyBaseLogger {
  return baseLog.child({}, { msgPrefix: `[${name}] ` })
}
