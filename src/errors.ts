/**
 * termflow Errors
 * ===============
 *
 * Error taxonomy shared by the observer engine and the router.
 *
 * - `PreventUpdate` is a skip signal. Dispatch treats it as a silent no-op.
 * - `UnknownObserver` is thrown by external delegation for an unregistered id.
 * - `FatalError` and any thrown value that is not an `Error` are never contained.
 *   Everything else is recoverable: logged, then isolated to one observer.
 */

/**
 * Base for all observer related errors.
 */
export class ObserverError extends Error {
  constructor(message?: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Indicates that all updates of the running dispatch should be skipped.
 */
export class PreventUpdate extends ObserverError {}

/**
 * An observer was requested by canonical id but was never registered.
 */
export class UnknownObserver extends ObserverError {}

/**
 * Errors that must reach the process instead of being logged and contained,
 * such as a deliberate shutdown request from inside a callback.
 */
export class FatalError extends Error {
  constructor(message?: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Whether an error may be logged and contained to the unit of work that raised it.
 */
export function isRecoverableError(error: unknown): error is Error {
  return error instanceof Error && !(error instanceof FatalError)
}

/**
 * Skips the current dispatch. Returns never for proper type inference.
 *
 * @example
 * ```ts
 * app.when(new Modified('search', 'value'), new Update('results', 'items'))(
 *   (query: string) => query.length < 3 ? preventUpdate() : search(query)
 * )
 * ```
 */
export function preventUpdate(message?: string): never {
  throw new PreventUpdate(message)
}
