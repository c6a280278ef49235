/**
 * termflow Dependencies
 * =====================
 *
 * Typed descriptors that point an observer at a component property or event.
 * A dependency is identified only by its `(targetId, targetProperty)` pair,
 * whichever subclass it is.
 */

const __noUpdateBrand = Symbol('__noUpdateBrand')

/** Reserved component id used by `Raised` dependencies. */
export const CALLBACK_ERROR_ID = '_callback_error_id'

/**
 * Object that carries a component id, such as a mounted component.
 */
export interface SupportsId {
  readonly id?: string | null
}

/**
 * Class of an event that components publish.
 */
export type EventType = abstract new (...args: never[]) => object

/**
 * Class of an error that observer callbacks may throw.
 */
export type ErrorType = abstract new (...args: never[]) => Error

/**
 * Marker for "skip writing this particular output".
 */
export type NoUpdate = { readonly [__noUpdateBrand]: true }

export const noUpdate: NoUpdate = Object.freeze({ [__noUpdateBrand]: true } as const)

export function isNoUpdate(value: unknown): value is NoUpdate {
  return value === noUpdate
}

function resolveId(target: string | SupportsId): string {
  const id = typeof target === 'string' ? target : target.id
  if (!id) {
    throw new TypeError(`Dependency target has no id: ${String(target)}`)
  }
  return id
}

const eventKeys = new WeakMap<Function, string>()
const eventNameCounts = new Map<string, number>()

function keyForClass(eventClass: Function): string {
  const cached = eventKeys.get(eventClass)
  if (cached) return cached
  if (!eventClass.name) {
    throw new TypeError(`Expected an event class, received: ${String(eventClass)}`)
  }
  // Later classes that reuse a name get a numbered key of their own.
  const count = (eventNameCounts.get(eventClass.name) ?? 0) + 1
  eventNameCounts.set(eventClass.name, count)
  const key = count === 1 ? eventClass.name : `${eventClass.name}#${count}`
  eventKeys.set(eventClass, key)
  return key
}

/**
 * Stable string identifier for an event class, unique per class object.
 * The first class with a given name is keyed by the plain name.
 */
export function eventKey(eventType: EventType): string {
  if (typeof eventType !== 'function') {
    throw new TypeError(`Expected an event class, received: ${String(eventType)}`)
  }
  return keyForClass(eventType)
}

/**
 * Key of the class an event instance was created from.
 */
export function eventKeyOf(event: object): string {
  return keyForClass(event.constructor)
}

/**
 * Base for all observation dependencies.
 */
export class Dependency {
  readonly targetId: string
  readonly targetProperty: string

  /**
   * @param target ID, or object with an ID, that a component uses to send and receive updates.
   * @param property Property name on the component that sends and receives updates.
   */
  constructor(target: string | SupportsId, property: string) {
    this.targetId = resolveId(target)
    this.targetProperty = property
  }

  /** Identity key, shared by every dependency on the same target property. */
  get key(): string {
    return `${this.targetId}@${this.targetProperty}`
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Dependency &&
      this.targetId === other.targetId &&
      this.targetProperty === other.targetProperty
    )
  }

  toString(): string {
    return `${this.constructor.name}('${this.targetId}', '${this.targetProperty}')`
  }
}

/**
 * Triggering input based on a stateful property update.
 */
export class Modified extends Dependency {}

/**
 * Triggering input based on a stateless event announced by a component.
 */
export class Published extends Dependency {
  readonly eventType: EventType

  constructor(target: string | SupportsId, eventType: EventType) {
    super(target, eventKey(eventType))
    this.eventType = eventType
  }
}

/**
 * Triggering input based on an error thrown by another observer's callback.
 *
 * Only errors from the callback itself are announced. Failures while collecting
 * arguments or applying updates are left to the manager's error hook.
 */
export class Raised extends Published {
  readonly errorType: ErrorType

  constructor(errorType: ErrorType) {
    super(CALLBACK_ERROR_ID, errorType)
    this.errorType = errorType
  }

  matches(error: unknown): boolean {
    return error instanceof this.errorType
  }
}

/**
 * Non-triggering input: the most recent property value, read when the callback runs.
 */
export class Select extends Dependency {}

/**
 * Output written to a component after the callback succeeds.
 */
export class Update extends Dependency {}

export interface FlattenedDependencies {
  publications: Published[]
  modifications: Modified[]
  selections: Select[]
  updates: Update[]
}

/**
 * Split dependencies into groups by kind, regardless of argument order.
 */
export function flattenDependencies(args: Iterable<unknown>): FlattenedDependencies {
  const groups: FlattenedDependencies = {
    publications: [],
    modifications: [],
    selections: [],
    updates: [],
  }
  for (const arg of args) {
    if (arg instanceof Published) {
      groups.publications.push(arg)
    } else if (arg instanceof Modified) {
      groups.modifications.push(arg)
    } else if (arg instanceof Select) {
      groups.selections.push(arg)
    } else if (arg instanceof Update) {
      groups.updates.push(arg)
    }
  }
  return groups
}

/**
 * Reject dependency sets that can never produce a working observer.
 *
 * @throws TypeError when there is no trigger, a trigger is duplicated, or an
 *   error handler is combined with other triggers.
 */
export function validateDependencies(...dependencies: Dependency[]): void {
  const triggers = new Set<string>()
  let raises = 0
  let others = 0
  for (const dependency of dependencies) {
    if (!(dependency instanceof Published || dependency instanceof Modified)) continue
    if (dependency instanceof Raised) {
      raises++
    } else {
      others++
    }
    if (raises && others) {
      throw new TypeError('No other triggering dependencies are allowed with error handlers, only Selects')
    }
    if (!(dependency instanceof Raised) && triggers.has(dependency.key)) {
      throw new TypeError(`Duplicate trigger dependency found for ${dependency.key}`)
    }
    triggers.add(dependency.key)
  }
  if (!triggers.size) {
    throw new TypeError('No trigger dependency found')
  }
}
