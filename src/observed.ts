/**
 * termflow Observed Objects
 * =========================
 *
 * Minimal reactive attribute holders, usable without an app.
 *
 * Subclasses list their reactive fields in a static `observed` record and
 * declare the field types with `declare`, so no class field shadows the
 * accessors installed at construction:
 *
 * ```ts
 * class Counter extends ObservedObject {
 *   static observed = {
 *     ...ObservedObject.observed,
 *     count: new ObservedValue(0),
 *   }
 *   declare count: number
 * }
 * ```
 */

import type { MaybePromise } from './observer'
import { PendingTasks } from './tasks'

/**
 * Receives the previous and current value of a changed field. Checked
 * bivariantly so typed handlers fit the untyped field record.
 */
export type ChangeHandler<T = unknown> = {
  bivarianceHack(oldValue: T, newValue: T): MaybePromise<unknown>
}['bivarianceHack']

/**
 * Container for a value that is monitored for changes by an `ObservedObject`.
 */
export class ObservedValue<T = unknown> {
  constructor(
    public value: T,
    public onChange?: ChangeHandler<T>
  ) {}
}

export type ObservedFields = Record<string, ObservedValue<unknown>>

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  )
}

/**
 * Object whose declared fields notify a handler when their value changes.
 */
export class ObservedObject {
  /** Field holders declared by the class. Copied into each instance. */
  static observed: ObservedFields = {}

  private readonly observedFields: ObservedFields = {}
  private readonly tasks = new PendingTasks()

  constructor() {
    for (const [name, declared] of Object.entries(new.target.observed)) {
      const holder = new ObservedValue(declared.value, declared.onChange)
      this.observedFields[name] = holder
      Object.defineProperty(this, name, {
        enumerable: true,
        configurable: false,
        get: () => holder.value,
        set: (value: unknown) => this.setObserved(holder, value),
      })
    }
  }

  private setObserved(holder: ObservedValue<unknown>, value: unknown): void {
    const oldValue = holder.value
    holder.value = value
    if (Object.is(oldValue, value) || !holder.onChange) return
    const result = holder.onChange(oldValue, value)
    if (isPromiseLike(result)) {
      this.tasks.add(result)
    }
  }

  /**
   * Set or clear the change handler of an observed field.
   *
   * @throws TypeError when the field is not observed.
   */
  observe(name: string, handler: ChangeHandler | undefined): void {
    this.holder(name).onChange = handler
  }

  private holder(name: string): ObservedValue<unknown> {
    const holder = this.observedFields[name]
    if (!holder) {
      throw new TypeError(`${this.constructor.name} has no observed field "${name}"`)
    }
    return holder
  }

  /**
   * Run a field's change handler with its current value as both old and new.
   *
   * @throws TypeError when the field is not observed.
   */
  notify(name: string): void {
    const holder = this.holder(name)
    const result = holder.onChange?.(holder.value, holder.value)
    if (isPromiseLike(result)) {
      this.tasks.add(result)
    }
  }

  /** Instance holders for every observed field. */
  get observedValues(): ObservedFields {
    return { ...this.observedFields }
  }

  /** Number of change handlers still running. */
  get pendingTasks(): number {
    return this.tasks.size
  }

  /**
   * Wait for change handlers scheduled by this object's fields.
   */
  settled(): Promise<void> {
    return this.tasks.settled()
  }
}
