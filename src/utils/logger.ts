import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
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

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

export type ServiceLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

type SerializableError =
  | Error
  | Record<string, unknown>
  | string
  | number
  | boolean
  | null
  | undefined

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

function toSerializableError(value: unknown): SerializableError {
  if (value instanceof Error) return value
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value))
  }
  return String(value)
}

/**
 * Creates an error serializer that keeps message, name, stack and the `code`
 * carried by list sync errors, and follows `cause` chains.
 */
export function createErrorSerializer() {
  const serialize = (err: SerializableError): unknown => {
    if (err == null) {
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

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('code' in err && err.code !== undefined) serialized.code = err.code

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof SyntaxError) {
      serialized.type = 'SyntaxError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    if ('stack' in err && err.stack) {
      serialized.stack = err.stack
    }

    // cause is often non-enumerable on Error
    if ('cause' in err && err.cause) {
      serialized.cause = serialize(toSerializableError(err.cause))
    }

    for (const [key, value] of Object.entries(err)) {
      if (
        !['message', 'stack', 'name', 'code', 'type', 'cause'].includes(key)
      ) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return serialize
}

/**
 * Generates a log filename for the given date and optional rotation index.
 * Without a time, returns the name of the current log file.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'medialist-sync-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `medialist-sync-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream under data/logs, falling back to stdout
 * when the directory cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
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

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: prettyOptions,
    },
    serializers: {
      error: createErrorSerializer(),
    },
  }
}

function getFileOptions(): FileLoggerOptions {
  return {
    level: 'info',
    stream: getFileStream(),
    serializers: {
      error: createErrorSerializer(),
    },
  }
}

/**
 * Generates logger configuration from environment variables.
 *
 * Always logs to file; `enableConsoleOutput=false` turns off the terminal copy.
 */
export function createLoggerConfig(): ServiceLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return getFileOptions()
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  const multistream = pino.multistream([
    { stream: prettyStream },
    { stream: fileStream },
  ])

  return {
    level: 'info',
    stream: multistream,
    serializers: {
      error: createErrorSerializer(),
    },
  }
}

/**
 * Child logger whose messages are prefixed with the service name.
 *
 * @example
 * const log = createServiceLogger(fastify.log, 'LIST_SYNC')
 * log.info('Started') // "[LIST_SYNC] Started"
 */
export function createServiceLogger(
  log: FastifyBaseLogger,
  serviceName: string,
): FastifyBaseLogger {
  return log.child({}, { msgPrefix: `[${serviceName.toUpperCase()}] ` })
}
