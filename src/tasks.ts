/**
 * Set of in-flight asynchronous work that nobody awaits directly.
 *
 * A failed task never becomes an unhandled rejection. Its error is held until
 * the next `settled()`, which rejects with it, so fatal errors still surface
 * to whoever waits.
 */
export class PendingTasks {
  private readonly tasks = new Set<Promise<void>>()
  private readonly failures: unknown[] = []

  get size(): number {
    return this.tasks.size
  }

  add(task: PromiseLike<unknown>): void {
    const tracked: Promise<void> = Promise.resolve(task)
      .then(
        () => undefined,
        (error: unknown) => {
          this.failures.push(error)
        }
      )
      .finally(() => {
        this.tasks.delete(tracked)
      })
    this.tasks.add(tracked)
  }

  /**
   * Wait until every task has settled, including tasks added while waiting.
   *
   * @throws The first error held since the last call.
   */
  async settled(): Promise<void> {
    while (this.tasks.size) {
      await Promise.all([...this.tasks])
    }
    if (this.failures.length) {
      const [failure] = this.failures.splice(0)
      throw failure
    }
  }
}
