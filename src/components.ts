/**
 * termflow Components
 * ===================
 *
 * Observable building blocks an app mounts and dispatches over. They hold
 * state only; nothing here lays out or renders anything.
 */

import { ObservedObject, ObservedValue } from './observed'

/**
 * Anything that can announce a component's messages to observers.
 */
export interface ComponentHost {
  publish(sender: Component, message: Message): void
}

/**
 * Base class for events published by components. Observers subscribe to a
 * message class with `Published(componentId, MessageClass)`.
 */
export class Message {
  constructor(readonly control: Component | null = null) {}
}

export interface ComponentOptions {
  id?: string | null
}

export class Component extends ObservedObject {
  id: string | null
  /** Host the component is mounted in, if any. */
  host: ComponentHost | null = null

  constructor(options: ComponentOptions = {}) {
    super()
    this.id = options.id ?? null
  }

  get mounted(): boolean {
    return this.host !== null
  }

  /**
   * Publish a message through the host.
   *
   * @returns Whether a host received the message.
   */
  post(message: Message): boolean {
    if (!this.host) return false
    this.host.publish(this, message)
    return true
  }

  /** Called after the component and its children are mounted. */
  onMount(): void {}

  /** Called before the component is removed from its host. */
  onUnmount(): void {}

  /** Components nested under this one. */
  childComponents(): Component[] {
    return []
  }
}

/**
 * Component that holds other components.
 */
export class Container extends Component {
  static observed = {
    ...Component.observed,
    children: new ObservedValue<Component[]>([]),
  }
  declare children: Component[]

  constructor(children: Component[] = [], options: ComponentOptions = {}) {
    super(options)
    this.children = children
  }

  childComponents(): Component[] {
    return this.children
  }
}

/**
 * Container holding the content of the current page in a multi-page app.
 */
export class PageContainer extends Container {}

/**
 * Convert an update value into a list of children.
 *
 * @throws TypeError when the value holds anything other than components.
 */
export function toChildren(value: unknown): Component[] {
  if (value === null || value === undefined) return []
  const values: unknown[] = Array.isArray(value) ? value : [value]
  return values.map(child => {
    if (!(child instanceof Component)) {
      throw new TypeError(`Expected a component as child, received: ${String(child)}`)
    }
    return child
  })
}

/**
 * Component with a single line of text.
 */
export class Text extends Component {
  static observed = {
    ...Component.observed,
    text: new ObservedValue(''),
  }
  declare text: string

  constructor(text = '', options: ComponentOptions = {}) {
    super(options)
    this.text = text
  }
}

/**
 * Published when a store's data changes.
 */
export class StoreUpdated extends Message {
  constructor(
    readonly store: Store,
    readonly data: unknown,
    readonly modifiedTimestamp: number
  ) {
    super(store)
  }
}

/**
 * Hidden component for sharing data between callbacks.
 */
export class Store extends Component {
  static observed = {
    ...Component.observed,
    data: new ObservedValue<unknown>(null),
    modifiedTimestamp: new ObservedValue(-1),
    // Set to true from a callback to clear the data.
    clearData: new ObservedValue(false),
  }
  declare data: unknown
  declare modifiedTimestamp: number
  declare clearData: boolean

  constructor(data: unknown = null, options: ComponentOptions = {}) {
    super(options)
    this.data = data
    this.observe('data', () => this.touch())
    this.observe('clearData', (_old, clear) => {
      if (!clear) return
      this.data = null
      this.clearData = false
    })
  }

  private touch(): void {
    this.modifiedTimestamp = Date.now()
    this.post(new StoreUpdated(this, this.data, this.modifiedTimestamp))
  }
}
