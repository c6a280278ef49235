/**
 * termflow App
 * ============
 *
 * Host for a tree of components. Mounting a component with an id lets every
 * change of its observed fields, and every message it posts, reach the
 * observers registered globally or on the app.
 *
 * With pages enabled, the app also routes the content container to the page
 * registered for the current location.
 *
 * @example
 * ```ts
 * const app = new ObservedApp({ usePages: true })
 * app.registerPage(() => new Text('Welcome'), { path: '/' })
 * app.start()
 * await app.settled()
 * ```
 */

import type { ComponentHost, Message } from './components'
import { Component, Container, PageContainer, Text, toChildren } from './components'
import { Modified, Select, Update, eventKeyOf } from './dependencies'
import type { ObserverManagerOptions } from './manager'
import { ObserverManager } from './manager'
import { Location } from './location'
import type { ChangeHandler } from './observed'
import type { MaybePromise } from './observer'
import type { Page, PageContent, PageLayout, PageOptions } from './pages'
import { globalPageMap, listPages, registerPage } from './pages'
import { attachToInstance, detachFromInstance } from './registry'
import type { RequestContext } from './router'
import { Endpoint, RouteRequest } from './router'
import { PendingTasks } from './tasks'

export const DEFAULT_LOCATION_ID = 'url'
export const DEFAULT_CONTENT_ID = 'content'

// Paths that are never routed directly, and serve every unknown path instead.
const NOT_FOUND_PATHS = ['/404', '/not_found', '/not_found_404']

export interface AppOptions extends ObserverManagerOptions {
  /**
   * Root of the component tree. Defaults to a container with a `Location`
   * (id "url") and a content container (id "content").
   */
  root?: Component
  /** Route the content container to registered pages. Implied by `pages`. */
  usePages?: boolean
  pages?: Array<Page | PageLayout>
  /** Path loaded by the default location on start. */
  initialPath?: string
}

function* walk(component: Component): Generator<Component> {
  yield component
  for (const child of component.childComponents()) {
    yield* walk(child)
  }
}

export class ObservedApp extends ObserverManager implements ComponentHost {
  readonly root: Component
  readonly usePages: boolean
  private readonly components = new Map<string, Component>()
  private readonly mountedComponents = new Set<Component>()
  private readonly originalHandlers = new Map<Component, Map<string, ChangeHandler | undefined>>()
  private readonly tasks = new PendingTasks()
  private readonly pages = new Map<string, Page>()
  private pagesEnabled = false
  private started = false

  constructor(options: AppOptions = {}) {
    super(options)
    const pages = options.pages ?? []
    this.usePages = options.usePages ?? pages.length > 0
    this.root = options.root ?? new Container([
      new Location({ id: DEFAULT_LOCATION_ID, path: options.initialPath, logger: this.logger }),
      this.usePages ? new PageContainer([], { id: DEFAULT_CONTENT_ID }) : new Container([], { id: DEFAULT_CONTENT_ID }),
    ])

    this.enablePages()
    for (const page of pages) {
      this.registerPage(page)
    }
  }

  get running(): boolean {
    return this.started
  }

  /**
   * Mount the component tree and bind the app's own observer methods.
   */
  start(): void {
    if (this.started) return
    this.started = true
    const bound = attachToInstance(this)
    this.logger.debug(`Starting app with ${bound} bound observers`)
    this.mountTree(this.root)
  }

  /**
   * Unmount every component and release the app's bound observers.
   */
  stop(): void {
    if (!this.started) return
    this.unmount(this.root)
    detachFromInstance(this)
    this.started = false
  }

  // ===========================================================================
  // COMPONENT TREE
  // ===========================================================================

  /**
   * Mount a component and its children. With a parent, the component is
   * appended to the parent's children instead.
   *
   * @throws Error when another mounted component already uses an id.
   */
  mount(component: Component, parent?: Container): void {
    if (!parent) {
      this.mountTree(component)
      return
    }
    if (!this.mountedComponents.has(parent)) {
      throw new Error(`Parent ${parent.id ?? parent.constructor.name} is not mounted`)
    }
    parent.children = [...parent.children, component]
  }

  /**
   * Remove a component and its children from the app, restoring their own
   * change handlers. The component stays in its parent's children.
   */
  unmount(component: Component): void {
    if (!this.mountedComponents.has(component)) return
    component.onUnmount()
    for (const child of component.childComponents()) {
      this.unmount(child)
    }
    for (const [name, handler] of this.originalHandlers.get(component) ?? []) {
      component.observe(name, handler)
    }
    this.originalHandlers.delete(component)
    this.mountedComponents.delete(component)
    if (component.id && this.components.get(component.id) === component) {
      this.components.delete(component.id)
    }
    component.host = null
  }

  private mountTree(component: Component): void {
    const added: Component[] = []
    this.attach(component, added)
    // Hooks run once the whole subtree is reachable by id.
    for (const mounted of added) {
      mounted.onMount()
    }
  }

  private attach(component: Component, added: Component[]): void {
    if (this.mountedComponents.has(component)) return
    const id = component.id
    if (id) {
      const existing = this.components.get(id)
      if (existing && existing !== component) {
        throw new Error(`Duplicate component id: ${id}`)
      }
      this.components.set(id, component)
    }
    this.mountedComponents.add(component)
    component.host = this
    this.watch(component)
    for (const child of component.childComponents()) {
      this.attach(child, added)
    }
    added.push(component)
  }

  /**
   * Wrap every observed field's handler so that changes are also dispatched.
   */
  private watch(component: Component): void {
    const originals = new Map<string, ChangeHandler | undefined>()
    for (const [name, holder] of Object.entries(component.observedValues)) {
      const original = holder.onChange
      originals.set(name, original)
      component.observe(name, (oldValue, newValue) => {
        if (component instanceof Container && name === 'children') {
          this.replaceChildren(toChildren(oldValue), toChildren(newValue))
        }
        const result = original?.(oldValue, newValue)
        if (component.id) {
          this.dispatch(component.id, name, oldValue, newValue)
        }
        return result
      })
    }
    this.originalHandlers.set(component, originals)
  }

  private replaceChildren(oldChildren: Component[], newChildren: Component[]): void {
    for (const child of oldChildren) {
      if (!newChildren.includes(child)) this.unmount(child)
    }
    const added: Component[] = []
    for (const child of newChildren) {
      this.attach(child, added)
    }
    for (const mounted of added) {
      mounted.onMount()
    }
  }

  /**
   * Run handlers on a later microtask, so callbacks read the state left by
   * the whole synchronous batch of changes.
   */
  private dispatch(componentId: string, property: string, oldValue: unknown, newValue: unknown): void {
    const handlers = this.generateHandlers(componentId, property)
    if (!handlers.length) return
    this.tasks.add(Promise.resolve().then(() => Promise.all(handlers.map(handler => handler(oldValue, newValue)))))
  }

  getComponent(componentId: string): Component | null {
    return this.components.get(componentId) ?? null
  }

  /**
   * Announce a message to observers of `Published(sender, MessageClass)`.
   */
  publish(sender: Component, message: Message): void {
    if (!sender.id) return
    this.dispatch(sender.id, eventKeyOf(message), null, message)
  }

  /**
   * Apply an update, replacing the children of containers as a whole.
   */
  applyUpdate(
    observerId: string,
    component: object,
    componentId: string,
    componentProperty: string,
    value: unknown
  ): MaybePromise<void> {
    if (component instanceof Container && componentProperty === 'children') {
      component.children = toChildren(value)
      return
    }
    return super.applyUpdate(observerId, component, componentId, componentProperty, value)
  }

  /**
   * Wait until every dispatch started by a change or message has finished,
   * including dispatches started while waiting.
   */
  async settled(): Promise<void> {
    do {
      await this.tasks.settled()
      await Promise.all([...this.mountedComponents].map(component => component.settled()))
    } while (this.tasks.size)
  }

  // ===========================================================================
  // LOCATION AND PAGES
  // ===========================================================================

  /** The first `Location` in the component tree. */
  get location(): Location | null {
    for (const component of walk(this.root)) {
      if (component instanceof Location) return component
    }
    return null
  }

  /** The first `PageContainer` in the component tree. */
  get pageContainer(): PageContainer | null {
    for (const component of walk(this.root)) {
      if (component instanceof PageContainer) return component
    }
    return null
  }

  private requireLocation(): Location {
    const location = this.location
    if (!location) {
      throw new Error('Layout must contain a Location component')
    }
    return location
  }

  /** Path of the currently loaded page. */
  get currentPage(): string {
    return this.requireLocation().pathname
  }

  /** Registered pages, sorted by order then path. */
  get pageRegistry(): Page[] {
    return listPages(this.pages)
  }

  /** Go back one URL in the history. Returns the new index. */
  back(): number {
    return this.requireLocation().back()
  }

  /** Go forward one URL in the history. Returns the new index. */
  forward(): number {
    return this.requireLocation().forward()
  }

  /** Reload the most recent URL in the history. */
  reload(): void {
    this.requireLocation().reload()
  }

  /**
   * Register a handler on the location's router.
   */
  route(path: string, methods: string[] = ['GET']) {
    return this.requireLocation().route(path, methods)
  }

  /**
   * Set up page routing: the content container follows the location's path.
   * Pages already in the global page map are registered too.
   *
   * @throws Error when the tree has no usable location or page container.
   */
  enablePages(): void {
    if (!this.usePages || this.pagesEnabled) return

    const location = this.requireLocation()
    if (!location.id) {
      throw new Error('Location component must have an id if pages are enabled')
    }
    const pageContainer = this.pageContainer
    if (!pageContainer) {
      throw new Error('Layout must contain a PageContainer component if pages are enabled')
    }
    if (!pageContainer.id) {
      throw new Error('PageContainer component must have an id if pages are enabled')
    }

    this.when(
      new Modified(location, 'pathname'),
      new Select(location, 'search'),
      new Update(pageContainer, 'children'),
    )(this.pageRouter)
    location.router.endpointNotFound = new Endpoint([], '', context => this.pageNotFound(context))
    this.pagesEnabled = true

    for (const page of listPages(globalPageMap)) {
      this.registerPage(page)
    }
  }

  /**
   * Register a URL path to a layout in this app.
   *
   * @throws Error when pages are not enabled, or the path is already registered.
   */
  registerPage(page: Page | PageLayout, options: PageOptions = {}): Page {
    if (!this.pagesEnabled) {
      throw new Error('Pages are not enabled on this application')
    }
    const registered = registerPage(page, options, this.pages)
    const location = this.requireLocation()
    const handler = (context: RequestContext): PageContent => registered.layout({ ...context, app: this })
    if (NOT_FOUND_PATHS.includes(registered.path)) {
      location.router.endpointNotFound = new Endpoint([], '', handler)
    } else {
      for (const path of registered.paths) {
        location.add(path, ['GET'], handler)
      }
    }
    return registered
  }

  /**
   * Navigate to a registered page.
   *
   * @param page Path, with or without search and hash. e.g. "/page1?resource_type=1#resource-1"
   * @throws Error when no page is registered for the path.
   */
  selectPage(page: string): void {
    const location = this.requireLocation()
    const request = new RouteRequest(page)
    const endpoint = location.endpoint(request.path, request.method)
    if (endpoint === location.router.endpointNotFound || endpoint === location.router.endpointNotAllowed) {
      throw new Error(`Page ${page} not found in the registry`)
    }
    if (location.url !== page) {
      location.url = page
    }
  }

  private readonly pageRouter = (pathname: string, search: string): unknown => {
    this.logger.debug(`Routing page content for: ${pathname}`)
    // Handlers are called directly instead of served, so errors reach the observer.
    const request = new RouteRequest(search ? `${pathname}?${search}` : pathname)
    const endpoint = this.requireLocation().endpoint(request.path, request.method)
    return endpoint.handler({
      request,
      params: endpoint.route.static ? {} : endpoint.route.matchGroups(request.path),
      query: request.query,
    })
  }

  private pageNotFound({ request }: RequestContext): Text {
    this.logger.warn(`Page not found ${request.path}`)
    return new Text('Page not found')
  }
}
