/**
 * In-process mutual exclusion
 *
 * A FIFO lock over promises. Each filesystem instance owns one and runs every
 * store-touching operation through {@link Mutex.runExclusive}, so operations
 * issued concurrently against the same instance complete one at a time, in
 * call order.
 *
 * @module core/mutex
 */

/**
 * FIFO mutex.
 *
 * @example
 * ```typescript
 * const mutex = new Mutex()
 * const result = await mutex.runExclusive(async () => {
 *   // no other runExclusive body on this mutex runs concurrently
 *   return compute()
 * })
 * ```
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  /**
   * Whether a critical section is running or queued.
   */
  get isLocked(): boolean {
    return this.pending > 0
  }

  /**
   * Run `fn` once every earlier caller has finished, then release the lock,
   * whether `fn` resolves or throws. The result (or error) of `fn` is passed
   * through.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => {}
    const held = new Promise<void>((resolve) => {
      release = resolve
    })
    const previous = this.tail
    this.tail = previous.then(() => held)
    this.pending++

    await previous
    try {
      return await fn()
    } finally {
      this.pending--
      release()
    }
  }
}
