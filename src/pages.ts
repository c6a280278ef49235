/**
 * termflow Pages
 * ==============
 *
 * Configuration for the pages of a multi-page app, routed by URL path.
 *
 * Pages registered with `registerPage` before an app enables pages are shared
 * by every app that enables them later.
 */

import type { ObservedApp } from './app'
import type { Component } from './components'
import type { RequestContext } from './router'

/** What a page layout renders into the content container. */
export type PageContent = Component | Component[] | null

export interface PageContext extends RequestContext {
  app: ObservedApp
}

/**
 * Builds the components shown for a page. Path variables arrive in `params`,
 * search values in `query`.
 */
export type PageLayout = (context: PageContext) => PageContent

export interface PageOptions {
  /**
   * URL path, with or without variables. e.g. "/", "/home", "/documents/{name}"
   * Inferred from the layout's function name when not provided:
   * `layoutHomePage` and `layout_home_page` both become "/home_page".
   */
  path?: string
  /** Link text, such as shown in navigation menus. Inferred from the path. */
  name?: string
  /** Relative order when listing pages. */
  order?: number
  /** Paths that also lead to this page. e.g. "/v1/home" */
  redirectFrom?: string | string[]
}

/** Pages shared across apps, keyed by path and redirect path. */
export const globalPageMap = new Map<string, Page>()

function pathFromLayout(layout: PageLayout): string {
  const name = layout.name
    .replace(/^layout_?/, '')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
  if (!name) {
    throw new Error(`Page layout "${layout.name}" has no usable name, a path is required`)
  }
  return name
}

function titleCase(path: string): string {
  return path
    .replace(/^\/+|\/+$/g, '')
    .replace(/[_-]+/g, ' ')
    .replace(/\w\S*/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
}

export class Page {
  layout: PageLayout
  path: string
  name: string
  order: number
  redirectFrom: string[]

  constructor(layout: PageLayout, options: PageOptions = {}) {
    const path = options.path || pathFromLayout(layout)
    this.layout = layout
    this.path = path.startsWith('/') ? path : `/${path}`
    this.name = options.name || titleCase(this.path)
    this.order = options.order ?? 0
    this.redirectFrom = typeof options.redirectFrom === 'string'
      ? [options.redirectFrom]
      : [...(options.redirectFrom ?? [])]
  }

  /** The page's own path, followed by every redirect path. */
  get paths(): string[] {
    return [this.path, ...this.redirectFrom]
  }
}

/**
 * Add a page to a page map. Options override values of an existing page.
 *
 * @throws Error when the path or a redirect path is already registered; the
 *   map is left untouched.
 */
export function registerPage(
  page: Page | PageLayout,
  options: PageOptions = {},
  pageMap: Map<string, Page> = globalPageMap
): Page {
  let registered: Page
  if (page instanceof Page) {
    registered = page
    if (options.path) registered.path = options.path.startsWith('/') ? options.path : `/${options.path}`
    if (options.name) registered.name = options.name
    if (options.order) registered.order = options.order
    if (options.redirectFrom) {
      registered.redirectFrom = typeof options.redirectFrom === 'string' ? [options.redirectFrom] : [...options.redirectFrom]
    }
  } else {
    registered = new Page(page, options)
  }

  for (const path of registered.paths) {
    if (pageMap.has(path)) {
      throw new Error(`Duplicate page found for path: ${path}`)
    }
  }
  for (const path of registered.paths) {
    pageMap.set(path, registered)
  }
  return registered
}

/**
 * Distinct pages of a page map, sorted by order then path.
 */
export function listPages(pageMap: Map<string, Page> = globalPageMap): Page[] {
  return [...new Set(pageMap.values())].sort((a, b) => a.order - b.order || a.path.localeCompare(b.path))
}
