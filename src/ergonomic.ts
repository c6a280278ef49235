/**
 * termflow Ergonomic Context API (with unctx)
 * ===========================================
 *
 * Composition-style access to the active app, so page layouts and setup code
 * can reach components without passing the app around.
 *
 * --- HOW IT WORKS ---
 * 1. `createAppWithContext` creates an app and registers it as a singleton
 *    context under a unique namespace.
 * 2. `useApp()`, `useComponent()` and `useLocation()` then read it from
 *    anywhere in synchronous code.
 *
 * --- ASYNC USAGE ---
 * The context is only available synchronously. Cache the result of a hook in
 * a local variable before the first `await`.
 */

import { getContext } from 'unctx'
import type { AppOptions } from './app'
import { ObservedApp } from './app'
import type { Component } from './components'
import type { Location } from './location'

const appContext = getContext<ObservedApp>('termflow-app-context')

/**
 * Create an app and set it as the active context for all hooks.
 * An app already set is replaced.
 */
export function createAppWithContext(options: AppOptions = {}): ObservedApp {
  const app = new ObservedApp(options)
  appContext.set(app, true)
  return app
}

/**
 * Run a function with an app as the active context. Throws when a different
 * app is already active.
 */
export function withApp<T>(app: ObservedApp, fn: () => T): T {
  return appContext.call(app, fn)
}

/** Clear the active app. */
export function clearAppContext(): void {
  appContext.unset()
}

/**
 * @returns The active app. Throws outside of a context.
 */
export function useApp(): ObservedApp {
  return appContext.use()
}

/**
 * @returns The active app, or `null` outside of a context.
 */
export function tryUseApp(): ObservedApp | null {
  return appContext.tryUse() ?? null
}

/**
 * Look up a mounted component of the active app by id.
 *
 * @throws Error when no component with the id is mounted.
 */
export function useComponent(componentId: string): Component {
  const component = useApp().getComponent(componentId)
  if (!component) {
    throw new Error(`[termflow] Component "${componentId}" is not mounted in the application.`)
  }
  return component
}

/**
 * @throws Error when the active app has no `Location` component.
 */
export function useLocation(): Location {
  const location = useApp().location
  if (!location) {
    throw new Error('[termflow] The application has no Location component.')
  }
  return location
}
