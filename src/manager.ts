/**
 * termflow Observer Manager
 * =========================
 *
 * Turns registered observers into change handlers and runs them against a host.
 *
 * A handler resolves its arguments, runs the observer's callback and applies the
 * resulting updates. All host access goes through overridable hooks, so the same
 * engine works over a component tree, plain objects, or a remote executor.
 *
 * Errors are contained per observer: a failing callback is logged and produces
 * no update, while sibling observers of the same mutation run to completion.
 */

import type { Dependency } from './dependencies'
import { CALLBACK_ERROR_ID, Published, Raised, Select } from './dependencies'
import { ObserverError, PreventUpdate, UnknownObserver, isRecoverableError } from './errors'
import type { Logger } from './logging'
import { consoleLogger } from './logging'
import type { MaybePromise, Observer, UpdateMap } from './observer'
import type { ObserverDecorator, RegisterOptions } from './registry'
import { ObserverRegistry, globalRegistry, registerObserver } from './registry'

/**
 * Receives the old and new value of a changed property, or `null` and the
 * payload of a published event.
 */
export type ValueUpdateHandler = (oldValue: unknown, newValue: unknown) => Promise<void>

export interface ObserverManagerOptions {
  /** Where callback failures and delegation warnings are reported. */
  logger?: Logger
  /** Process-wide registry consulted before the local one. */
  registry?: ObserverRegistry
}

export abstract class ObserverManager {
  /** Observers registered through this manager's `when`. */
  readonly observers = new ObserverRegistry()
  readonly globalObservers: ObserverRegistry
  logger: Logger

  constructor(options: ObserverManagerOptions = {}) {
    this.logger = options.logger ?? consoleLogger
    this.globalObservers = options.registry ?? globalRegistry
  }

  /**
   * Find a component for use in a callback.
   *
   * @returns The component, or null if it is not currently available.
   */
  abstract getComponent(componentId: string): object | null

  /**
   * Apply a single update to a component. Defaults to a plain property write.
   */
  applyUpdate(
    _observerId: string,
    component: object,
    _componentId: string,
    componentProperty: string,
    value: unknown
  ): MaybePromise<void> {
    Reflect.set(component, componentProperty, value)
  }

  /**
   * Read a value to pass to a callback. Defaults to a plain property read.
   *
   * @throws PreventUpdate when the component is not available.
   */
  getCallbackArg(observerId: string, componentId: string, componentProperty: string): unknown {
    const component = this.getComponent(componentId)
    if (!component) {
      throw new PreventUpdate(`Skipping callback for ${observerId}: Component ${componentId} not available`)
    }
    return Reflect.get(component, componentProperty)
  }

  /**
   * Report a failed callback. Errors that are not recoverable are rethrown.
   */
  onCallbackError(observerId: string, error: unknown): void {
    if (!isRecoverableError(error)) {
      throw error
    }
    this.logger.error(
      `Failed callback for ${observerId}: ${error.name} ${error.message}\n${error.stack ?? ''}`,
      { observerId, errorType: error.name, message: error.message, stack: error.stack }
    )
  }

  /**
   * Forward a callback to be handled externally.
   *
   * Override to send the request to a remote endpoint. Given the same canonical
   * id and arguments, the endpoint must return the same shaped update map a
   * local call would, or throw. The default runs the local observer.
   *
   * @throws UnknownObserver when the id was never registered.
   */
  sendCallback(observerId: string, ...args: unknown[]): MaybePromise<UpdateMap | undefined> {
    const observer = this.observers.get(observerId) ?? this.globalObservers.get(observerId)
    if (!observer) {
      throw new UnknownObserver(`Callback ${observerId} was requested but could not be found.`)
    }
    this.logger.warn(
      `External callback ${observerId} is forwarding to local callback: override "sendCallback" in ${this.constructor.name} or remove "external" from callback`
    )
    return observer.callback(...args)
  }

  /**
   * Register a callback in this manager's local registry.
   *
   * @example
   * ```ts
   * app.when(
   *   new Modified('url', 'pathname'),
   *   new Update('content', 'children'),
   * )((pathname: string) => renderPage(pathname))
   * ```
   */
  when(...dependencies: Dependency[]): ObserverDecorator {
    return registerObserver(this.observers, dependencies)
  }

  /**
   * Register locally with split or external options.
   */
  whenWith(options: RegisterOptions, ...dependencies: Dependency[]): ObserverDecorator {
    return registerObserver(this.observers, dependencies, options)
  }

  /**
   * Create handlers for every observer triggered by a component property or event.
   * Global observers come first, then local ones.
   */
  generateHandlers(componentId: string, componentProperty: string): ValueUpdateHandler[] {
    return [
      ...this.globalObservers.observersFor(componentId, componentProperty),
      ...this.observers.observersFor(componentId, componentProperty),
    ].map(observer => this.generateHandler(componentId, componentProperty, observer))
  }

  /**
   * Announce a callback error to every `Raised` observer that accepts it.
   */
  async dispatchRaised(error: Error): Promise<void> {
    // An observer listed under several error types still runs once per error.
    const matched = new Map<Observer, string>()
    for (const registry of [this.globalObservers, this.observers]) {
      for (const [property, observers] of registry.observersForTarget(CALLBACK_ERROR_ID)) {
        for (const observer of observers) {
          if (matched.has(observer)) continue
          if (observer.publications.some(dependency => dependency instanceof Raised && dependency.matches(error))) {
            matched.set(observer, property)
          }
        }
      }
    }
    const handlers = [...matched].map(([observer, property]) =>
      this.generateHandler(CALLBACK_ERROR_ID, property, observer)
    )
    await Promise.all(handlers.map(handler => handler(null, error)))
  }

  protected generateHandler(
    modifiedId: string,
    modifiedProperty: string,
    observer: Observer
  ): ValueUpdateHandler {
    return async (oldValue, newValue) => {
      const updateComponents = this.getUpdateComponents(observer)
      if (!updateComponents) {
        // One or more targets not mounted; expected, so not reported.
        return
      }
      const observerId = observer.observerId

      const args: unknown[] = []
      for (const dependency of observer.inputs) {
        if (dependency instanceof Published) {
          // Events have no stored state to read back.
          args.push(dependency.targetId === modifiedId ? newValue : null)
        } else if (dependency.targetId === modifiedId && dependency.targetProperty === modifiedProperty) {
          args.push(dependency instanceof Select ? oldValue : newValue)
        } else {
          try {
            args.push(this.getCallbackArg(observerId, dependency.targetId, dependency.targetProperty))
          } catch (error) {
            if (!(error instanceof PreventUpdate)) {
              this.onCallbackError(observerId, error)
            }
            return
          }
        }
      }

      let updates: UpdateMap | undefined
      try {
        updates = observer.external
          ? await this.sendCallback(observerId, ...args)
          : await observer.callback(...args)
      } catch (error) {
        if (error instanceof PreventUpdate) return
        this.onCallbackError(observerId, error)
        if (isRecoverableError(error) && !observer.isErrorHandler) {
          await this.dispatchRaised(error)
        }
        return
      }
      if (!updates) return

      // Each entry is applied on its own: one failure does not stop the rest.
      for (const [updateId, properties] of Object.entries(updates)) {
        for (const [updateProperty, value] of Object.entries(properties)) {
          try {
            const component = updateComponents.get(updateId)
            if (!component) {
              throw new ObserverError(`Callback ${observerId} returned an undeclared update target: ${updateId}`)
            }
            await this.applyUpdate(observerId, component, updateId, updateProperty, value)
          } catch (error) {
            this.onCallbackError(observerId, error)
          }
        }
      }
    }
  }

  /**
   * Find all components a callback will update, or null if any is unavailable.
   */
  protected getUpdateComponents(observer: Observer): Map<string, object> | null {
    const components = new Map<string, object>()
    for (const dependency of observer.updates) {
      const component = this.getComponent(dependency.targetId)
      if (!component) return null
      components.set(dependency.targetId, component)
    }
    return components
  }
}
