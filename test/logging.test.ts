import { describe, it, expect, vi } from 'vitest'
import { createLogger, nullLogger } from '../src/logging'

function createSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('Logging', () => {
  it('should prefix messages and pass details through', () => {
    const sink = createSink()
    const logger = createLogger({ sink })

    logger.info('started', { components: 3 })

    expect(sink.info).toHaveBeenCalledWith('[termflow] started', { components: 3 })
  })

  it('should drop messages below the level', () => {
    const sink = createSink()
    const logger = createLogger({ level: 'warn', sink })

    logger.debug('hidden')
    logger.info('hidden')
    logger.warn('shown')
    logger.error('shown too')

    expect(sink.debug).not.toHaveBeenCalled()
    expect(sink.info).not.toHaveBeenCalled()
    expect(sink.warn).toHaveBeenCalledWith('[termflow] shown')
    expect(sink.error).toHaveBeenCalledWith('[termflow] shown too')
  })

  it('should write messages as they are without a prefix', () => {
    const sink = createSink()

    createLogger({ level: 'debug', prefix: '', sink }).debug('raw')

    expect(sink.debug).toHaveBeenCalledWith('raw')
  })

  it('should drop everything when silent', () => {
    const sink = createSink()

    createLogger({ level: 'silent', sink }).error('hidden')

    expect(sink.error).not.toHaveBeenCalled()
    expect(() => nullLogger.error('hidden')).not.toThrow()
  })
})
