import { vi } from 'vitest'
import { eventKeyOf } from '../src/dependencies'
import { ObserverManager } from '../src/manager'
import type { ObserverManagerOptions } from '../src/manager'

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

export type TestComponent = Record<string, unknown>

/**
 * Manager over plain objects, dispatching by hand.
 */
export class ObjectManager extends ObserverManager {
  readonly components = new Map<string, TestComponent>()

  constructor(options: ObserverManagerOptions = {}) {
    super(options)
  }

  getComponent(componentId: string): TestComponent | null {
    return this.components.get(componentId) ?? null
  }

  /** Write a property, then run every handler for it to completion. */
  async change(componentId: string, property: string, value: unknown): Promise<void> {
    const component = this.components.get(componentId)
    const oldValue = component?.[property]
    if (component) component[property] = value
    await Promise.all(this.generateHandlers(componentId, property).map(handler => handler(oldValue, value)))
  }

  /** Run every handler for a published event to completion. */
  async emit(componentId: string, event: object): Promise<void> {
    await Promise.all(
      this.generateHandlers(componentId, eventKeyOf(event)).map(handler => handler(null, event))
    )
  }
}
