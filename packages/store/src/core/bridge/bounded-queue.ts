type Waiter = () => void

/**
 * Single-producer, single-consumer async queue with a fixed capacity.
 *
 * `put` waits while the queue is full, `take` waits while it is empty. After
 * `close()` both return immediately: `put` with false, `take` with undefined.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = []
  private readonly notEmpty: Waiter[] = []
  private readonly notFull: Waiter[] = []
  private closed = false

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be an integer >= 1 (got ${capacity})`)
    }
  }

  get size(): number {
    return this.items.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  async put(item: T): Promise<boolean> {
    while (!this.closed && this.items.length >= this.capacity) {
      await this.wait(this.notFull)
    }

    if (this.closed) return false

    this.items.push(item)
    this.wakeOne(this.notEmpty)
    return true
  }

  async take(): Promise<T | undefined> {
    while (!this.closed && this.items.length === 0) {
      await this.wait(this.notEmpty)
    }

    if (this.closed) return undefined

    const item = this.items.shift()
    this.wakeOne(this.notFull)
    return item
  }

  /** Drops queued items and releases every waiter. Idempotent. */
  close(): void {
    if (this.closed) return

    this.closed = true
    this.items.length = 0
    this.wakeAll(this.notEmpty)
    this.wakeAll(this.notFull)
  }

  private wait(waiters: Waiter[]): Promise<void> {
    return new Promise((resolve) => waiters.push(resolve))
  }

  private wakeOne(waiters: Waiter[]): void {
    waiters.shift()?.()
  }

  private wakeAll(waiters: Waiter[]): void {
    for (const wake of waiters.splice(0)) wake()
  }
}
