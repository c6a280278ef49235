import { describe, it, expect, vi } from 'vitest'
import type { ComponentHost } from '../src/components'
import { HistoryUpdated, Location, URLUpdated } from '../src/location'
import { createTestLogger } from './support'

describe('Location', () => {
  it('should split a URL into observed fields', () => {
    const location = new Location({ id: 'url' })

    location.url = '/docs/intro?tag=a#usage'

    expect(location.pathname).toBe('/docs/intro')
    expect(location.search).toBe('tag=a')
    expect(location.hash).toBe('usage')
    expect(location.url).toBe('/docs/intro?tag=a#usage')
    expect(location.href).toBe('/docs/intro?tag=a#usage')
    expect(location.historyState).toEqual([['/docs/intro?tag=a#usage'], 0])
  })

  it('should load the initial path on mount', () => {
    const location = new Location({ path: '/start' })

    location.onMount()

    expect(location.url).toBe('/start')
  })

  it('should update the URL without saving when asked', () => {
    const location = new Location()
    location.url = '/a'

    location.updateUrl('/b', false)

    expect(location.pathname).toBe('/b')
    expect(location.historyState).toEqual([['/a'], 0])
  })

  it('should move through the history', () => {
    const location = new Location()
    location.href = '/one'
    location.href = '/two?page=2'

    expect(location.back()).toBe(0)
    expect(location.url).toBe('/one')
    expect(location.back()).toBe(0)
    expect(location.forward()).toBe(1)
    expect(location.url).toBe('/two?page=2')
    expect(location.historyState).toEqual([['/one', '/two?page=2'], 1])
  })

  it('should notify pathname observers again on reload', () => {
    const location = new Location()
    const handler = vi.fn()
    location.observe('pathname', handler)
    location.url = '/a'

    location.reload()

    expect(handler.mock.calls).toEqual([['', '/a'], ['/a', '/a']])
  })

  it('should reload when refreshUrl is set', () => {
    const location = new Location()
    const handler = vi.fn()
    location.url = '/a'
    location.observe('pathname', handler)

    location.refreshUrl = true

    expect(location.refreshUrl).toBe(false)
    expect(handler).toHaveBeenCalledWith('/a', '/a')
  })

  it('should post history and URL events when enabled', () => {
    const location = new Location({ enableUrlEvents: true, enableHistoryEvents: true })
    const publish = vi.fn()
    const host: ComponentHost = { publish }
    location.host = host

    location.url = '/a'

    const messages = publish.mock.calls.map(([, message]) => message)
    expect(messages).toHaveLength(2)
    expect(messages[0]).toBeInstanceOf(HistoryUpdated)
    expect(messages[1]).toBeInstanceOf(URLUpdated)
    expect(messages[1]).toMatchObject({ oldUrl: '', newUrl: '/a' })
  })

  it('should not post events by default', () => {
    const location = new Location()
    const publish = vi.fn()
    location.host = { publish }

    location.url = '/a'

    expect(publish).not.toHaveBeenCalled()
  })

  it('should serve requests without changing the URL', () => {
    const location = new Location()
    location.route('/items/{id}')(({ params }) => `item ${params.id}`)

    expect(location.get('/items/3')).toBe('item 3')
    expect(location.endpoint('/items/3').route.path).toBe('/items/{id}')
    expect(location.pathname).toBe('')
    expect(location.historyState).toEqual([[], null])
  })

  it('should share its logger with the router', () => {
    const logger = createTestLogger()
    const location = new Location({ logger })

    location.get('/missing')

    expect(location.logger).toBe(logger)
    expect(logger.warn).toHaveBeenCalledWith('Not found /missing')
  })
})
