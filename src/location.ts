/**
 * termflow Location
 * =================
 *
 * Hidden component holding the current URL of an app, its history, and the
 * router used to resolve it. Observers watch `pathname`, `search` and `hash`
 * like any other component fields.
 */

import type { ComponentOptions } from './components'
import { Component, Message } from './components'
import { History } from './history'
import type { Logger } from './logging'
import { ObservedValue } from './observed'
import type { Endpoint, EndpointHandler, RouterOptions } from './router'
import { RouteRequest, Router } from './router'

export class LocationMessage extends Message {
  constructor(readonly location: Location) {
    super(location)
  }
}

/** Posted when the location history changes. */
export class HistoryUpdated extends LocationMessage {}

/** Posted when the location URL changes. */
export class URLUpdated extends LocationMessage {
  constructor(
    location: Location,
    readonly oldUrl: string,
    readonly newUrl: string
  ) {
    super(location)
  }
}

export interface LocationOptions extends ComponentOptions, RouterOptions {
  /** Path loaded when the location is mounted. */
  path?: string
  enableUrlEvents?: boolean
  enableHistoryEvents?: boolean
}

export class Location extends Component {
  static observed = {
    ...Component.observed,
    // The path in a URL. e.g. "/path/to/resource"
    pathname: new ObservedValue(''),
    // The query in a URL, without "?". e.g. "resource_type=1"
    search: new ObservedValue(''),
    // The fragment in a URL, without "#". e.g. "resource-1"
    hash: new ObservedValue(''),
    // Set to true from a callback to reload the current URL.
    refreshUrl: new ObservedValue(false),
  }
  declare pathname: string
  declare search: string
  declare hash: string
  declare refreshUrl: boolean

  readonly router: Router
  urlEventsEnabled: boolean
  historyEventsEnabled: boolean
  private readonly history = new History<string>()
  private readonly initialPath: string

  constructor(options: LocationOptions = {}) {
    super(options)
    this.router = new Router({ logger: options.logger })
    this.initialPath = options.path ?? '/'
    this.urlEventsEnabled = options.enableUrlEvents ?? false
    this.historyEventsEnabled = options.enableHistoryEvents ?? false
    this.observe('refreshUrl', (_old, refresh) => {
      if (!refresh) return
      this.refreshUrl = false
      this.reload()
    })
  }

  get logger(): Logger {
    return this.router.logger
  }

  set logger(logger: Logger) {
    this.router.logger = logger
  }

  onMount(): void {
    this.url = this.initialPath
  }

  /**
   * Full URL with path, search, and hash. e.g. "/path?resource_type=1#resource-1"
   * Setting it always saves to the history; see `updateUrl` otherwise.
   */
  get url(): string {
    let href = this.pathname
    if (this.search) href = `${href}?${this.search}`
    if (this.hash) href = `${href}#${this.hash}`
    return href
  }

  set url(url: string) {
    this.updateUrl(url)
  }

  /** Alias for `url`. */
  get href(): string {
    return this.url
  }

  set href(url: string) {
    this.url = url
  }

  /** Full history, and the index of the current position in it. */
  get historyState(): [string[], number | null] {
    return [this.history.values, this.history.index]
  }

  /**
   * Update the path, search, and hash from a URL.
   *
   * @param save Whether to add the URL to the history.
   */
  updateUrl(url: string, save = true): void {
    const oldUrl = this.url
    const parsed = new RouteRequest(url).url
    this.pathname = parsed.pathname
    this.search = parsed.search.replace(/^\?/, '')
    this.hash = parsed.hash.replace(/^#/, '')
    if (save) {
      this.history.add(url)
      this.sendHistoryUpdate()
    }
    if (this.urlEventsEnabled) {
      this.post(new URLUpdated(this, oldUrl, url))
    }
  }

  /** Go back in the history. Returns the new index. */
  back(): number {
    return this.move(() => this.history.back())
  }

  /** Go forward in the history. Returns the new index. */
  forward(): number {
    return this.move(() => this.history.forward())
  }

  private move(step: () => number): number {
    const oldIndex = this.history.index
    const newIndex = step()
    const value = this.history.value
    if (newIndex !== oldIndex && value !== undefined) {
      this.updateUrl(value, false)
      this.sendHistoryUpdate()
    }
    return newIndex
  }

  /**
   * Reload the current URL from the history. Observers of `pathname` run again
   * even when the URL is unchanged.
   */
  reload(): void {
    const value = this.history.value
    if (value === undefined) return
    if (value === this.url) {
      this.notify('pathname')
    } else {
      this.updateUrl(value, false)
    }
  }

  private sendHistoryUpdate(): void {
    if (this.historyEventsEnabled) {
      this.post(new HistoryUpdated(this))
    }
  }

  /**
   * Serve a GET request through the router, without changing the URL or history.
   */
  get(url: string): unknown {
    return this.router.serve(url)
  }

  route(path: string, methods: string[] = ['GET']) {
    return this.router.route(path, methods)
  }

  endpoint(path: string, method = 'GET'): Endpoint {
    return this.router.endpoint(path, method)
  }

  add(path: string, methods: string[], handler: EndpointHandler): Endpoint {
    return this.router.add(path, methods, handler)
  }
}
