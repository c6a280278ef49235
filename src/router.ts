/**
 * termflow Router
 * ===============
 *
 * Routes path/method requests to handlers, the way a web server routes URLs.
 *
 * Static paths are matched exactly through a map. Paths with `{variable}`
 * segments are compiled to patterns and tried in order of complexity, so the
 * most specific route wins.
 */

import { isRecoverableError } from './errors'
import type { Logger } from './logging'
import { consoleLogger } from './logging'

// Base for parsing relative request paths with the WHATWG URL parser.
const URL_BASE = 'http://termflow.local'

const VARIABLE_NAME = /^[A-Za-z_$][\w$]*$/

function trimTrailingSlashes(path: string): string {
  return path.replace(/\/+$/, '')
}

/**
 * User request for a URL.
 */
export class RouteRequest {
  readonly method: string
  readonly url: URL
  readonly query: Record<string, string[]>

  /**
   * @param url Path to the requested resource, optionally with search and hash.
   * @param method Operation requested from the URL.
   */
  constructor(url: string, method = 'GET') {
    this.method = method.toUpperCase()
    this.url = new URL(url, URL_BASE)
    const query: Record<string, string[]> = {}
    for (const [key, value] of this.url.searchParams) {
      ;(query[key] ??= []).push(value)
    }
    this.query = query
  }

  get path(): string {
    return this.url.pathname
  }
}

/**
 * Arguments passed to every endpoint handler.
 */
export interface RequestContext {
  request: RouteRequest
  /** Values of `{variable}` segments in the matched route. */
  params: Record<string, string>
  query: Record<string, string[]>
}

export type EndpointHandler<TResult = unknown> = (context: RequestContext) => TResult

/**
 * Weighted path for routing, comparing, and collecting variables from request paths.
 */
export class Route {
  readonly path: string
  readonly variables: string[] = []
  /** [segment index, segment length] of every static segment. */
  readonly staticWeights: Array<[number, number]> = []
  readonly pattern: RegExp
  readonly static: boolean
  /** Path with variable names blanked out, e.g. `/docs/{}`. Equal for routes matching the same paths. */
  readonly signature: string

  /**
   * @param path Static path such as `/path/1`, or dynamic path such as `/path/{name}`.
   * @throws Error when a variable is unclosed, duplicated, or not an identifier.
   */
  constructor(path: string) {
    this.path = path
    let regex = ''
    let signature = ''
    path.replace(/^\/+|\/+$/g, '').split('/').forEach((part, index) => {
      if (part.startsWith('{')) {
        if (!part.endsWith('}')) {
          throw new Error(`Variable (${part}) missing closing } in path: ${path}`)
        }
        const name = part.slice(1, -1)
        if (!VARIABLE_NAME.test(name)) {
          throw new Error(`Variable (${name}) is not a valid name in path: ${path}`)
        }
        if (this.variables.includes(name)) {
          throw new Error(`Variable (${name}) duplicated in path: ${path}`)
        }
        this.variables.push(name)
        regex += `/(?<${name}>[^/]+)`
        signature += '/{}'
      } else {
        this.staticWeights.push([index, part.length])
        regex += `/${part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}`
        signature += `/${part}`
      }
    })
    this.pattern = new RegExp(`^${regex}$`)
    this.static = !this.variables.length
    this.signature = signature
  }

  /**
   * Order two routes so that less complex routes come first:
   *   1. Static routes, longer paths first.
   *   2. Dynamic routes with more static segments.
   *   3. Dynamic routes with static segments earlier in the path.
   *   4. Dynamic routes with shorter static segments.
   *   5. Dynamic routes with fewer variables.
   */
  static compareComplexity(left: Route, right: Route): number {
    if (left.static && right.static) {
      return Math.sign(right.path.length - left.path.length)
    }
    if (left.static !== right.static) {
      return left.static ? -1 : 1
    }

    const staticParts = right.staticWeights.length - left.staticWeights.length
    if (staticParts) return Math.sign(staticParts)

    for (let i = 0; i < left.staticWeights.length; i++) {
      const [leftIndex, leftLength] = left.staticWeights[i]
      const [rightIndex, rightLength] = right.staticWeights[i]
      if (leftIndex !== rightIndex) return Math.sign(leftIndex - rightIndex)
      if (leftLength !== rightLength) return Math.sign(leftLength - rightLength)
    }
    return Math.sign(left.variables.length - right.variables.length)
  }

  compareTo(other: Route): number {
    return Route.compareComplexity(this, other)
  }

  match(path: string): boolean {
    return this.pattern.test(trimTrailingSlashes(path) || '/')
  }

  /**
   * Collect the variables of a path that matches this route.
   */
  matchGroups(path: string): Record<string, string> {
    const match = this.pattern.exec(trimTrailingSlashes(path) || '/')
    return { ...match?.groups }
  }
}

/**
 * A handler reachable through a route and a set of methods.
 */
export class Endpoint<TResult = unknown> {
  readonly methods: string[]
  readonly route: Route

  /**
   * @param refreshAllowed Whether repeated requests to this same endpoint are allowed.
   */
  constructor(
    methods: string[],
    route: Route | string,
    readonly handler: EndpointHandler<TResult>,
    readonly refreshAllowed = true
  ) {
    this.methods = methods.map(method => method.toUpperCase())
    this.route = route instanceof Route ? route : new Route(route)
  }

  compareTo(other: Endpoint<TResult>): number {
    return this.route.compareTo(other.route)
  }
}

export type ErrorHandler<TResult> = (request: RouteRequest, error: unknown) => TResult | undefined

export interface RouterOptions {
  logger?: Logger
}

/**
 * Routes path/method requests to matching endpoints.
 */
export class Router<TResult = unknown> {
  logger: Logger
  /** Dynamic endpoints, least complex first. */
  weightedEndpoints: Array<Endpoint<TResult | undefined>> = []
  /** Structured as: dynamicEndpoints[signature][method] = Endpoint */
  readonly dynamicEndpoints = new Map<string, Map<string, Endpoint<TResult | undefined>>>()
  /** Structured as: staticEndpoints[path][method] = Endpoint */
  readonly staticEndpoints = new Map<string, Map<string, Endpoint<TResult | undefined>>>()
  endpointNotAllowed: Endpoint<TResult | undefined>
  endpointNotFound: Endpoint<TResult | undefined>
  errorHandler: ErrorHandler<TResult>

  constructor(options: RouterOptions = {}) {
    this.logger = options.logger ?? consoleLogger
    this.endpointNotAllowed = new Endpoint([], '', ({ request }) => {
      this.logger.warn(`Method Not Allowed ${request.method} ${request.path}`)
      return undefined
    })
    this.endpointNotFound = new Endpoint([], '', ({ request }) => {
      this.logger.warn(`Not found ${request.path}`)
      return undefined
    })
    this.errorHandler = (request, error) => {
      if (!isRecoverableError(error)) throw error
      this.logger.error(`Internal Error during ${request.method} ${request.path} ${error.message}`, error)
      return undefined
    }
  }

  /**
   * Register a handler for a path and one or more methods.
   *
   * @throws Error when the path has no leading slash or a method is already registered.
   */
  add(
    path: string,
    methods: string[],
    handler: EndpointHandler<TResult | undefined>,
    refreshAllowed = true
  ): Endpoint<TResult | undefined> {
    if (!path.startsWith('/')) {
      throw new Error(`Missing required leading slash in path: ${path}`)
    }
    const trimmed = trimTrailingSlashes(path)
    const endpoint = new Endpoint(methods, trimmed, handler, refreshAllowed)
    if (endpoint.route.static) {
      this.addEndpoint(this.staticEndpoints, trimmed, endpoint, path)
    } else {
      this.addEndpoint(this.dynamicEndpoints, endpoint.route.signature, endpoint, path)
      this.weightedEndpoints = [...this.weightedEndpoints, endpoint].sort((a, b) => a.compareTo(b))
    }
    return endpoint
  }

  private addEndpoint(
    table: Map<string, Map<string, Endpoint<TResult | undefined>>>,
    key: string,
    endpoint: Endpoint<TResult | undefined>,
    path: string
  ): void {
    let methods = table.get(key)
    if (!methods) {
      methods = new Map()
      table.set(key, methods)
    }
    for (const method of endpoint.methods) {
      if (methods.has(method)) {
        throw new Error(`Method (${method}) already registered for path: ${path}`)
      }
    }
    for (const method of endpoint.methods) {
      methods.set(method, endpoint)
      this.logger.debug(`Registered ${endpoint.route.static ? 'static' : 'dynamic'} route for ${method} ${path}`)
    }
  }

  /**
   * Find the best endpoint for a path/method combination.
   *
   * @returns The matching endpoint, or `endpointNotAllowed` / `endpointNotFound`.
   */
  endpoint(path: string, method: string): Endpoint<TResult | undefined> {
    const trimmed = trimTrailingSlashes(path)
    const upper = method.toUpperCase()
    const methods = this.staticEndpoints.get(trimmed)
    if (methods) {
      return methods.get(upper) ?? this.endpointNotAllowed
    }
    for (const endpoint of this.weightedEndpoints) {
      if (endpoint.route.match(trimmed)) {
        if (endpoint.methods.includes(upper)) return endpoint
        return this.dynamicEndpoints.get(endpoint.route.signature)?.get(upper) ?? this.endpointNotAllowed
      }
    }
    return this.endpointNotFound
  }

  /**
   * Create a decorator that registers a handler for a path/method combination.
   *
   * @example
   * ```ts
   * router.route('/run/{item}')(({ params }) => run(params.item))
   * ```
   */
  route(path: string, methods: string[] = ['GET']) {
    return <H extends EndpointHandler<TResult | undefined>>(handler: H): H => {
      this.add(path, methods, handler)
      return handler
    }
  }

  /**
   * Build the context passed to a handler. Override to add host values.
   */
  protected createContext(endpoint: Endpoint<TResult | undefined>, request: RouteRequest): RequestContext {
    return {
      request,
      params: endpoint.route.static ? {} : endpoint.route.matchGroups(request.path),
      query: request.query,
    }
  }

  /**
   * Serve a request by matching its path and method against the registered endpoints.
   *
   * @returns The handler's result, or the error handler's result if it failed.
   */
  serve(url: string, method = 'GET'): TResult | undefined {
    const request = new RouteRequest(url, method)
    const endpoint = this.endpoint(request.path, request.method)
    this.logger.debug(`Serving new request: ${request.method} ${url}`)
    try {
      return endpoint.handler(this.createContext(endpoint, request))
    } catch (error) {
      try {
        return this.errorHandler(request, error)
      } catch (handlerError) {
        if (!isRecoverableError(handlerError)) throw handlerError
        this.logger.error(
          `Failed to handle error with error handler ${request.method} ${request.path} ${handlerError.message}`
        )
        return undefined
      }
    }
  }
}
