/**
 * termflow Observer Registry
 * ==========================
 *
 * Index of registered observers, and the `when` registration primitive.
 *
 * Registries are written while modules, classes and instances are set up, and
 * only read while dispatching. One process-wide registry (`globalRegistry`) is
 * created when this module loads. Managers receive it by reference and consult
 * it before their own local registry.
 */

import type { Dependency, Published, Modified } from './dependencies'
import { flattenDependencies, validateDependencies } from './dependencies'
import type { ObserverCallback } from './observer'
import { Observer } from './observer'

export interface RegisterOptions {
  /** Register one observer per publication, instead of one for all publications. */
  splitPublications?: boolean
  /** Register one observer per modification, instead of one for all modifications. */
  splitModifications?: boolean
  /**
   * Run the callback through the manager's `sendCallback` seam instead of locally.
   * External callbacks should be stateless and rely only on their arguments.
   */
  external?: boolean
}

/**
 * Registers a function as an observer and returns it unchanged.
 * Also usable as a method decorator, in which case the context is ignored.
 */
export type ObserverDecorator = <F extends ObserverCallback>(fn: F, context?: ClassMethodDecoratorContext) => F

/**
 * Observers generated for each registered function, for late binding to instances.
 */
const taggedCallbacks = new WeakMap<ObserverCallback, Observer[]>()

export class ObserverRegistry {
  /** Structured as: observerMap[componentId][componentProperty] = Observer[] */
  readonly observerMap = new Map<string, Map<string, Observer[]>>()
  readonly observerIdMap = new Map<string, Observer>()

  add(observer: Observer): void {
    this.observerIdMap.set(observer.observerId, observer)
    for (const trigger of observer.triggers) {
      let properties = this.observerMap.get(trigger.targetId)
      if (!properties) {
        properties = new Map()
        this.observerMap.set(trigger.targetId, properties)
      }
      const observers = properties.get(trigger.targetProperty)
      if (observers) {
        observers.push(observer)
      } else {
        properties.set(trigger.targetProperty, [observer])
      }
    }
  }

  observersFor(componentId: string, componentProperty: string): readonly Observer[] {
    return this.observerMap.get(componentId)?.get(componentProperty) ?? []
  }

  /** All observers triggered by any property or event of one component. */
  observersForTarget(componentId: string): Array<[string, readonly Observer[]]> {
    return [...(this.observerMap.get(componentId) ?? new Map<string, Observer[]>())]
  }

  get(observerId: string): Observer | undefined {
    return this.observerIdMap.get(observerId)
  }

  has(observerId: string): boolean {
    return this.observerIdMap.has(observerId)
  }

  get size(): number {
    return this.observerIdMap.size
  }

  clear(): void {
    this.observerMap.clear()
    this.observerIdMap.clear()
  }

  /**
   * Register a callback that triggers when observed values change.
   *
   * @example
   * ```ts
   * registry.when(
   *   new Modified('url', 'pathname'),
   *   new Update('content', 'children'),
   * )(routeUrl)
   * ```
   */
  when(...dependencies: Dependency[]): ObserverDecorator {
    return registerObserver(this, dependencies)
  }
}

/**
 * Create a decorator that registers a function as one or more observers.
 *
 * With splitting disabled, one observer fires on the union of its triggers.
 * With splitting enabled, one observer is created per trigger, so the same
 * function runs with a different trigger subset each time.
 */
export function registerObserver(
  registry: ObserverRegistry,
  dependencies: readonly Dependency[],
  options: RegisterOptions = {}
): ObserverDecorator {
  const { splitPublications = false, splitModifications = false, external = false } = options

  return <F extends ObserverCallback>(fn: F, _context?: ClassMethodDecoratorContext): F => {
    const { publications, modifications, selections, updates } = flattenDependencies(dependencies)
    validateDependencies(...dependencies)

    const publicationGroups: Published[][] = splitPublications && publications.length
      ? publications.map(dependency => [dependency])
      : [publications]
    const modificationGroups: Modified[][] = splitModifications && modifications.length
      ? modifications.map(dependency => [dependency])
      : [modifications]

    const tagged = taggedCallbacks.get(fn) ?? []
    for (const publicationGroup of publicationGroups) {
      for (const modificationGroup of modificationGroups) {
        const observer = new Observer({
          publications: publicationGroup,
          modifications: modificationGroup,
          selections,
          updates,
          callback: fn,
          external,
        })
        tagged.push(observer)
        registry.add(observer)
      }
    }
    taggedCallbacks.set(fn, tagged)
    return fn
  }
}

/**
 * Observers registered for one function, across every registry.
 */
export function observersOf(fn: ObserverCallback): readonly Observer[] {
  return taggedCallbacks.get(fn) ?? []
}

function* methodsOf(instance: object): Generator<ObserverCallback> {
  let prototype: object | null = Object.getPrototypeOf(instance)
  while (prototype && prototype !== Object.prototype) {
    for (const name of Object.getOwnPropertyNames(prototype)) {
      const descriptor = Object.getOwnPropertyDescriptor(prototype, name)
      if (typeof descriptor?.value === 'function') {
        yield descriptor.value
      }
    }
    prototype = Object.getPrototypeOf(prototype)
  }
}

/**
 * Bind every observer declared on the instance's class methods to this instance.
 *
 * The observers keep only a weak reference: once the instance is collected,
 * or detached, its observers skip their dispatches.
 */
export function attachToInstance(instance: object): number {
  let count = 0
  for (const method of methodsOf(instance)) {
    for (const observer of observersOf(method)) {
      observer.bind(instance)
      count++
    }
  }
  return count
}

/**
 * Release observers bound to this instance, for explicit teardown.
 */
export function detachFromInstance(instance: object): number {
  let count = 0
  for (const method of methodsOf(instance)) {
    for (const observer of observersOf(method)) {
      if (observer.instance === instance) {
        observer.unbind()
        count++
      }
    }
  }
  return count
}

/**
 * Process-wide registry, visible to every manager that does not inject its own.
 */
export const globalRegistry = new ObserverRegistry()

/**
 * Register a callback into the process-wide registry.
 *
 * @example
 * ```ts
 * when(
 *   new Modified('ping', 'value'),
 *   new Select('other', 'value'),
 *   new Update('pong', 'value'),
 * )(async (ping: string, other: string) => `ping ${ping} with ${other}`)
 * ```
 */
export function when(...dependencies: Dependency[]): ObserverDecorator {
  return registerObserver(globalRegistry, dependencies)
}

/**
 * Register into the process-wide registry with split or external options.
 */
export function whenWith(options: RegisterOptions, ...dependencies: Dependency[]): ObserverDecorator {
  return registerObserver(globalRegistry, dependencies, options)
}
