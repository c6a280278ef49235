/**
 * Bounded list of visited values with a movable cursor.
 */
export class History<T = string> {
  private entries: T[]
  private cursor: number
  readonly maxLength: number

  /**
   * @param initial Values to start with; the cursor is placed on the last one.
   * @param maxLength Oldest values are dropped past this length.
   */
  constructor(initial: T[] = [], maxLength = 32) {
    this.maxLength = maxLength
    this.entries = initial.slice(-maxLength)
    this.cursor = Math.max(this.entries.length - 1, 0)
  }

  /**
   * Add a value after the cursor, discarding any forward history.
   */
  add(value: T): void {
    this.entries = this.entries.slice(0, this.cursor + 1)
    this.entries.push(value)
    if (this.entries.length > this.maxLength) {
      this.entries = this.entries.slice(-this.maxLength)
    }
    this.cursor = this.entries.length - 1
  }

  /** Move back one value. Returns the new index. */
  back(): number {
    if (this.cursor > 0) this.cursor--
    return this.cursor
  }

  /** Move forward one value. Returns the new index. */
  forward(): number {
    if (this.cursor < this.entries.length - 1) this.cursor++
    return this.cursor
  }

  /** Index of the current value, or null when the history is empty. */
  get index(): number | null {
    return this.entries.length ? this.cursor : null
  }

  get value(): T | undefined {
    return this.entries[this.cursor]
  }

  get values(): T[] {
    return [...this.entries]
  }

  get length(): number {
    return this.entries.length
  }

  /**
   * Remove a value by position. The cursor stays on the same value when it
   * can, or moves back one when its value was removed.
   *
   * @returns The removed value, or undefined for an invalid index.
   */
  remove(index: number): T | undefined {
    if (index < 0 || index >= this.entries.length) return undefined
    const [value] = this.entries.splice(index, 1)
    if (index <= this.cursor && this.cursor > 0) {
      this.cursor--
    }
    return value
  }

  /** Remove and return the newest value. */
  pop(): T | undefined {
    return this.remove(this.entries.length - 1)
  }
}
