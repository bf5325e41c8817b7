import { ItemNotFoundError } from '@root/types/errors.js'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

// Mock dependencies before importing the module
vi.mock('dotenv', () => ({
  config: vi.fn(),
}))

vi.mock('rotating-file-stream', () => ({
  createStream: vi.fn(() => ({
    write: vi.fn(),
    end: vi.fn(),
  })),
}))

vi.mock('node:fs', async () => {
  const actual = await vi.importActual<typeof import('node:fs')>('node:fs')
  return {
    ...actual,
    default: {
      ...actual,
      existsSync: vi.fn(() => true),
      mkdirSync: vi.fn(),
    },
  }
})

// Now import the module after mocks are set up
const {
  createErrorSerializer,
  createLoggerConfig,
  createServiceLogger,
  filename,
  validLogLevels,
} = await import('@utils/logger.js')
const rfs = await import('rotating-file-stream')

describe('logger', () => {
  describe('validLogLevels', () => {
    it('should export all valid pino log levels', () => {
      expect(validLogLevels).toEqual([
        'fatal',
        'error',
        'warn',
        'info',
        'debug',
        'trace',
        'silent',
      ])
    })
  })

  describe('createServiceLogger', () => {
    it('should create a child logger with an uppercased prefix', () => {
      const parent = createMockLogger()

      createServiceLogger(parent, 'list_sync')

      expect(parent.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[LIST_SYNC] ' },
      )
    })
  })

  describe('filename', () => {
    it('should name the current file when no time is given', () => {
      expect(filename(0)).toBe('medialist-sync-current.log')
    })

    it('should name rotated files by local date and index', () => {
      const date = new Date(2024, 0, 5, 12)

      expect(filename(date)).toBe('medialist-sync-2024-01-05.log')
      expect(filename(date, 2)).toBe('medialist-sync-2024-01-05-2.log')
    })
  })

  describe('createErrorSerializer', () => {
    const serialize = createErrorSerializer()

    it('should serialize primitives with a type', () => {
      expect(serialize('string error')).toEqual({
        message: 'string error',
        type: 'StringError',
      })
      expect(serialize(404)).toEqual({ message: '404', type: 'NumberError' })
      expect(serialize(false)).toEqual({
        message: 'false',
        type: 'BooleanError',
      })
    })

    it('should pass null and undefined through', () => {
      expect(serialize(null)).toBeNull()
      expect(serialize(undefined)).toBeUndefined()
    })

    it('should keep the code and fields of list sync errors', () => {
      expect(serialize(new ItemNotFoundError(4))).toMatchObject({
        message: 'Item 4 not found',
        name: 'ItemNotFoundError',
        code: 'ITEM_NOT_FOUND',
        type: 'Error',
        itemId: 4,
      })
    })

    it('should tag built-in error subclasses', () => {
      expect(serialize(new RangeError('Invalid position: NaN'))).toMatchObject(
        { type: 'RangeError' },
      )
    })

    it('should follow the cause chain', () => {
      const error = new Error('outer', { cause: 'inner' })

      expect(serialize(error)).toMatchObject({
        message: 'outer',
        cause: { message: 'inner', type: 'StringError' },
      })
    })

    it('should use the name of plain error-like objects as the type', () => {
      expect(
        serialize({ name: 'LookupFailure', message: 'boom', attempt: 1 }),
      ).toEqual({
        name: 'LookupFailure',
        message: 'boom',
        type: 'LookupFailure',
        attempt: 1,
      })
    })
  })

  describe('createLoggerConfig', () => {
    const originalConsoleOutput = process.env.enableConsoleOutput

    beforeEach(() => {
      vi.clearAllMocks()
    })

    afterEach(() => {
      if (originalConsoleOutput === undefined) {
        delete process.env.enableConsoleOutput
      } else {
        process.env.enableConsoleOutput = originalConsoleOutput
      }
    })

    it('should log only to the rotating file when console output is off', () => {
      process.env.enableConsoleOutput = 'false'

      const options = createLoggerConfig()

      expect(options.level).toBe('info')
      expect(rfs.createStream).toHaveBeenCalledWith(
        filename,
        expect.objectContaining({ size: '10M', maxFiles: 7 }),
      )
      expect('transport' in options).toBe(false)
    })
  })
})
