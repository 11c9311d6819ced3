import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  createConsoleLogger,
  createPrefixedLogger,
  createSilentLogger,
} from '../../../src/utils/logger.js'
import type { Logger } from '../../../src/utils/logger.js'

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes level-tagged lines to the console', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})

    const logger = createConsoleLogger()
    logger.warn('Conflicting value kept', { field: 'homeGoals' })
    logger.info('Source merged')

    expect(warn).toHaveBeenCalledWith('[WARN] Conflicting value kept', { field: 'homeGoals' })
    expect(info).toHaveBeenCalledWith('[INFO] Source merged')
  })

  it('drops messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    const logger = createConsoleLogger('error')
    logger.debug('Row skipped')
    logger.error('Source could not be read')

    expect(debug).not.toHaveBeenCalled()
    expect(error).toHaveBeenCalledTimes(1)
  })

  it('nests prefixes', () => {
    const base: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }

    const logger = createPrefixedLogger('league-matches', createPrefixedLogger('ingestion', base))
    logger.info('Source merged', { processed: 6 })

    expect(base.info).toHaveBeenCalledWith('[ingestion] [league-matches] Source merged', { processed: 6 })
  })

  it('stays silent', () => {
    const log = vi.spyOn(console, 'log')

    createSilentLogger().error('ignored')

    expect(log).not.toHaveBeenCalled()
  })
})
