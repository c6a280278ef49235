import { describe, it, expect, vi } from 'vitest'
import { Modified, Published, Raised, Select, Update, noUpdate } from '../src/dependencies'
import { PreventUpdate } from '../src/errors'
import { Observer } from '../src/observer'
import type { ObserverCallback } from '../src/observer'

class Clicked {}

function createObserver(callback: ObserverCallback, updates: Update[]) {
  return new Observer({
    publications: [],
    modifications: [new Modified('a', 'value')],
    selections: [],
    updates,
    callback,
  })
}

describe('Observer', () => {
  describe('Identity', () => {
    it('should build a canonical id from triggers and updates', () => {
      const observer = new Observer({
        publications: [new Published('button', Clicked)],
        modifications: [new Modified('a', 'value'), new Modified('b', 'value')],
        selections: [new Select('c', 'value')],
        updates: [new Update('d', 'value'), new Update('e', 'text')],
        callback: () => undefined,
      })

      expect(observer.observerId).toBe('button@Clicked..a@value..b@value...d@value..e@text')
      expect(observer.external).toBe(false)
      expect(observer.toString()).toBe(
        "Observer('button@Clicked..a@value..b@value...d@value..e@text', external=false)"
      )
    })

    it('should order inputs as publications, modifications, then selections', () => {
      const published = new Published('button', Clicked)
      const modified = new Modified('a', 'value')
      const selected = new Select('c', 'value')
      const observer = new Observer({
        publications: [published],
        modifications: [modified],
        selections: [selected],
        updates: [],
        callback: () => undefined,
      })

      expect(observer.inputs).toEqual([published, modified, selected])
      expect(observer.triggers).toEqual([published, modified])
      expect(observer.isErrorHandler).toBe(false)
    })

    it('should recognize error handlers', () => {
      const observer = new Observer({
        publications: [new Raised(Error)],
        modifications: [],
        selections: [],
        updates: [],
        callback: () => undefined,
      })

      expect(observer.isErrorHandler).toBe(true)
    })
  })

  describe('Result normalization', () => {
    it('should zip results onto updates in order', async () => {
      const observer = createObserver(() => [1, 'two'], [new Update('b', 'value'), new Update('c', 'text')])

      expect(await observer.callback()).toEqual({ b: { value: 1 }, c: { text: 'two' } })
    })

    it('should skip outputs marked with noUpdate', async () => {
      const observer = createObserver(() => [1, noUpdate], [new Update('b', 'value'), new Update('c', 'value')])

      expect(await observer.callback()).toEqual({ b: { value: 1 } })
    })

    it('should return nothing when every output is skipped', async () => {
      const observer = createObserver(() => [noUpdate, noUpdate], [new Update('b', 'value'), new Update('c', 'value')])

      expect(await observer.callback()).toBeUndefined()
    })

    it('should return nothing for a noUpdate result', async () => {
      const observer = createObserver(() => noUpdate, [new Update('b', 'value')])

      expect(await observer.callback()).toBeUndefined()
    })

    it('should wrap the result of a single update, even an array', async () => {
      const observer = createObserver(() => [1, 2], [new Update('b', 'value')])

      expect(await observer.callback()).toEqual({ b: { value: [1, 2] } })
    })

    it('should group several properties of one target', async () => {
      const observer = createObserver(() => ['x', 'y'], [new Update('b', 'first'), new Update('b', 'second')])

      expect(await observer.callback()).toEqual({ b: { first: 'x', second: 'y' } })
    })

    it('should ignore updates past the end of a shorter result', async () => {
      const observer = createObserver(() => ['x'], [new Update('b', 'value'), new Update('c', 'value')])

      expect(await observer.callback()).toEqual({ b: { value: 'x' } })
    })

    it('should reject a single value for several updates', async () => {
      const observer = createObserver(() => 'x', [new Update('b', 'value'), new Update('c', 'value')])

      await expect(observer.callback()).rejects.toThrow(
        'Callback a@value...b@value..c@value must return an array for its 2 updates, received: x'
      )
    })

    it('should run callbacks without updates and return nothing', async () => {
      const callback = vi.fn(() => 'ignored')
      const observer = createObserver(callback, [])

      expect(await observer.callback('input')).toBeUndefined()
      expect(callback).toHaveBeenCalledWith('input')
    })

    it('should await asynchronous callbacks', async () => {
      const observer = createObserver(async (value: string) => `async ${value}`, [new Update('b', 'value')])

      expect(await observer.callback('input')).toEqual({ b: { value: 'async input' } })
    })
  })

  describe('Instance binding', () => {
    class Greeter {
      greeting = 'hello'

      greet(name: string) {
        return `${this.greeting} ${name}`
      }
    }

    it('should call the function with a bound instance as this', async () => {
      const greeter = new Greeter()
      const observer = createObserver(Greeter.prototype.greet, [new Update('b', 'value')])

      observer.bind(greeter)

      expect(observer.instance).toBe(greeter)
      expect(await observer.callback('world')).toEqual({ b: { value: 'hello world' } })
    })

    it('should use the most recent binding', async () => {
      const first = new Greeter()
      const second = new Greeter()
      second.greeting = 'hi'
      const observer = createObserver(Greeter.prototype.greet, [new Update('b', 'value')])

      observer.bind(first)
      observer.bind(second)

      expect(await observer.callback('world')).toEqual({ b: { value: 'hi world' } })
    })

    it('should skip dispatches once the instance is detached', async () => {
      const greet = vi.fn(Greeter.prototype.greet)
      const observer = createObserver(greet, [new Update('b', 'value')])

      observer.bind(new Greeter())
      observer.unbind()

      await expect(observer.callback('world')).rejects.toBeInstanceOf(PreventUpdate)
      expect(greet).not.toHaveBeenCalled()
    })
  })
})
