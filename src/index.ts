/**
 * termflow: Reactive Observers and URL Routing for Component Trees
 * =================================================================
 *
 * Declarative "when these change, recompute and write these" rules over
 * identified components:
 *
 * - Dependency descriptors for triggers, selects and updates
 * - Global and per-app observer registries, with late binding to instances
 * - A dispatch engine with per-observer error containment
 * - Observed objects and a small component tree host
 * - URL routing, history and multi-page content
 *
 * @license MIT
 */

// =============================================================================
// DEPENDENCIES AND ERRORS
// =============================================================================

export {
  CALLBACK_ERROR_ID,
  Dependency,
  Modified,
  Published,
  Raised,
  Select,
  Update,
  eventKey,
  eventKeyOf,
  flattenDependencies,
  isNoUpdate,
  noUpdate,
  validateDependencies,
} from './dependencies'
export type { ErrorType, EventType, FlattenedDependencies, NoUpdate, SupportsId } from './dependencies'

export {
  FatalError,
  ObserverError,
  PreventUpdate,
  UnknownObserver,
  isRecoverableError,
  preventUpdate,
} from './errors'

// =============================================================================
// OBSERVERS AND DISPATCH
// =============================================================================

export { Observer } from './observer'
export type { MaybePromise, ObserverCallback, ObserverInit, UpdateMap } from './observer'

export {
  ObserverRegistry,
  attachToInstance,
  detachFromInstance,
  globalRegistry,
  observersOf,
  registerObserver,
  when,
  whenWith,
} from './registry'
export type { ObserverDecorator, RegisterOptions } from './registry'

export { ObserverManager } from './manager'
export type { ObserverManagerOptions, ValueUpdateHandler } from './manager'

export { PendingTasks } from './tasks'

// =============================================================================
// OBSERVED OBJECTS AND COMPONENTS
// =============================================================================

export { ObservedObject, ObservedValue } from './observed'
export type { ChangeHandler, ObservedFields } from './observed'

export {
  Component,
  Container,
  Message,
  PageContainer,
  Store,
  StoreUpdated,
  Text,
  toChildren,
} from './components'
export type { ComponentHost, ComponentOptions } from './components'

// =============================================================================
// ROUTING
// =============================================================================

export { Endpoint, Route, RouteRequest, Router } from './router'
export type { EndpointHandler, ErrorHandler, RequestContext, RouterOptions } from './router'

export { History } from './history'

export { HistoryUpdated, Location, LocationMessage, URLUpdated } from './location'
export type { LocationOptions } from './location'

export { Page, globalPageMap, listPages, registerPage } from './pages'
export type { PageContent, PageContext, PageLayout, PageOptions } from './pages'

// =============================================================================
// APP HOST AND CONTEXT
// =============================================================================

export { DEFAULT_CONTENT_ID, DEFAULT_LOCATION_ID, ObservedApp } from './app'
export type { AppOptions } from './app'

export {
  clearAppContext,
  createAppWithContext,
  tryUseApp,
  useApp,
  useComponent,
  useLocation,
  withApp,
} from './ergonomic'

// =============================================================================
// LOGGING
// =============================================================================

export { consoleLogger, createLogger, nullLogger } from './logging'
export type { LogLevel, LogSink, Logger, LoggerOptions } from './logging'
