import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  createLevelLogger,
  createPrefixedLogger,
  createSilentLogger,
  defaultLogger,
  type Logger,
} from '../../../src/utils/logger.js'

function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('defaultLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes to the console with a level prefix', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    defaultLogger.info('ready', { entities: 7 })
    defaultLogger.warn('careful')

    expect(log).toHaveBeenCalledWith('[INFO] ready', { entities: 7 })
    expect(warn).toHaveBeenCalledWith('[WARN] careful', '')
  })
})

describe('createSilentLogger', () => {
  it('accepts every level without output', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const logger = createSilentLogger()

    logger.debug('x')
    logger.error('y')

    expect(log).not.toHaveBeenCalled()
    log.mockRestore()
  })
})

describe('createPrefixedLogger', () => {
  it('prefixes messages with the component name', () => {
    const base = mockLogger()
    const logger = createPrefixedLogger('planner', base)

    logger.info('done', { n: 1 })
    logger.error('failed')

    expect(base.info).toHaveBeenCalledWith('[planner] done', { n: 1 })
    expect(base.error).toHaveBeenCalledWith('[planner] failed', undefined)
  })
})

describe('createLevelLogger', () => {
  it('drops messages below the minimum level', () => {
    const base = mockLogger()
    const logger = createLevelLogger('warn', base)

    logger.debug('a')
    logger.info('b')
    logger.warn('c')
    logger.error('d')

    expect(base.debug).not.toHaveBeenCalled()
    expect(base.info).not.toHaveBeenCalled()
    expect(base.warn).toHaveBeenCalledWith('c', undefined)
    expect(base.error).toHaveBeenCalledWith('d', undefined)
  })
})
