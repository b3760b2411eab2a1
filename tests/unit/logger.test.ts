/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createConsoleLogger, logger, noopLogger, setLogger } from '../../src/utils/logger'

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes every level by default', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})

    const log = createConsoleLogger()
    log.debug('reader released', { id: 1 })
    log.info('pipe started')

    expect(debug).toHaveBeenCalledWith('[stream-bridge] [DEBUG] reader released', { id: 1 })
    expect(info).toHaveBeenCalledWith('[stream-bridge] [INFO] pipe started')
  })

  it('drops entries below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const log = createConsoleLogger({ level: 'warn' })
    log.debug('hidden')
    log.info('hidden')
    log.warn('shown')

    expect(debug).not.toHaveBeenCalled()
    expect(info).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('always writes errors, with the error value when given', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const failure = new Error('boom')

    const log = createConsoleLogger({ level: 'error', prefix: '[test]' })
    log.error('pipe failed', failure)
    log.error('pipe failed')

    expect(error).toHaveBeenNthCalledWith(1, '[test] [ERROR] pipe failed', failure)
    expect(error).toHaveBeenNthCalledWith(2, '[test] [ERROR] pipe failed')
  })
})

describe('setLogger', () => {
  it('replaces the global logger', () => {
    const custom = createConsoleLogger({ level: 'error' })

    setLogger(custom)
    expect(logger).toBe(custom)

    setLogger(noopLogger)
    expect(logger).toBe(noopLogger)
  })
})
