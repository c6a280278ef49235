import type { Dependency, Modified, Published, Select, Update } from './dependencies'
import { Raised, isNoUpdate } from './dependencies'
import { ObserverError, PreventUpdate } from './errors'

/**
 * A value now, or a value later. Callbacks and hooks may return either.
 */
export type MaybePromise<T> = T | PromiseLike<T>

/**
 * Any user function that can back an observer. Parameters are checked
 * bivariantly so that callbacks keep their own argument types.
 */
export type ObserverCallback = {
  bivarianceHack(...args: unknown[]): unknown
}['bivarianceHack']

/**
 * Updates produced by one successful callback, by component id then property.
 */
export type UpdateMap = Record<string, Record<string, unknown>>

export interface ObserverInit {
  publications: Published[]
  modifications: Modified[]
  selections: Select[]
  updates: Update[]
  callback: ObserverCallback
  external?: boolean
}

function joinKeys(dependencies: Dependency[]): string {
  return dependencies.map(dependency => dependency.key).join('..')
}

/**
 * One registered reactive rule: triggers and selects in, updates out.
 */
export class Observer {
  readonly observerId: string
  readonly publications: Published[]
  readonly modifications: Modified[]
  readonly selections: Select[]
  readonly updates: Update[]
  readonly external: boolean
  private readonly fn: ObserverCallback
  private instanceRef?: WeakRef<object>
  private bound = false

  constructor(init: ObserverInit) {
    this.publications = init.publications
    this.modifications = init.modifications
    this.selections = init.selections
    this.updates = init.updates
    this.fn = init.callback
    this.external = init.external ?? false
    this.observerId = `${joinKeys(this.triggers)}...${joinKeys(this.updates)}`
  }

  /** Dependencies that fire this observer, publications first. */
  get triggers(): Array<Published | Modified> {
    return [...this.publications, ...this.modifications]
  }

  /** Dependencies that supply callback arguments, in argument order. */
  get inputs(): Array<Published | Modified | Select> {
    return [...this.publications, ...this.modifications, ...this.selections]
  }

  get isErrorHandler(): boolean {
    return this.publications.some(dependency => dependency instanceof Raised)
  }

  /** The bound instance, while it is still alive. */
  get instance(): object | undefined {
    return this.instanceRef?.deref()
  }

  /**
   * Late-bind the callback to an instance without keeping the instance alive.
   */
  bind(instance: object): void {
    this.instanceRef = new WeakRef(instance)
    this.bound = true
  }

  /**
   * Drop the binding. A detached observer skips every later dispatch.
   */
  unbind(): void {
    this.instanceRef = undefined
  }

  /**
   * Run the user function and normalize its result into an update map.
   *
   * @returns Updates by component id and property, or undefined when there is nothing to apply.
   * @throws PreventUpdate when the bound instance is gone.
   * @throws ObserverError when several updates are declared and the result is not an array.
   */
  async callback(...args: unknown[]): Promise<UpdateMap | undefined> {
    let result: unknown
    if (this.bound) {
      const instance = this.instance
      if (!instance) {
        throw new PreventUpdate(`Skipping callback for ${this.observerId}: bound instance is no longer available`)
      }
      result = await this.fn.apply(instance, args)
    } else {
      result = await this.fn(...args)
    }

    if (isNoUpdate(result) || !this.updates.length) {
      return undefined
    }
    let values: unknown[] = [result]
    if (this.updates.length > 1) {
      if (!Array.isArray(result)) {
        throw new ObserverError(
          `Callback ${this.observerId} must return an array for its ${this.updates.length} updates, received: ${String(result)}`
        )
      }
      values = result
    }

    const updates: UpdateMap = {}
    let hasUpdate = false
    this.updates.forEach((update, index) => {
      if (index >= values.length) return
      const value: unknown = values[index]
      if (isNoUpdate(value)) return
      updates[update.targetId] ??= {}
      updates[update.targetId][update.targetProperty] = value
      hasUpdate = true
    })
    return hasUpdate ? updates : undefined
  }

  toString(): string {
    return `Observer('${this.observerId}', external=${this.external})`
  }
}
