import type { KeyValue } from "../../ports/key-value"
import type { KeyValueIterator } from "../../ports/key-value-iterator"
import type { Notification } from "../../ports/notification"
import { endOfSequence, scanFailed } from "../errors/store-error"
import { BoundedQueue } from "./bounded-queue"
import { Mutex } from "./mutex"

/**
 * Hands entries from a producer (the scan engine) to a pulling consumer.
 *
 * @remarks
 * The queue holds `pageSize + 1` notifications: a full page plus its terminal
 * marker fit without the producer waiting on a consumer that has buffered
 * one entry by peeking.
 *
 * The producer side is `push`/`complete`/`fail` plus `closed` and `signal`,
 * which tell it to stop. Everything else is the consumer's
 * {@link KeyValueIterator}.
 */
export class IteratorBridge<K, V> implements KeyValueIterator<K, V> {
  private readonly queue: BoundedQueue<Notification<KeyValue<K, V>>>
  private readonly mutex = new Mutex()
  private readonly controller = new AbortController()

  private buffered: KeyValue<K, V> | undefined
  private exhausted = false

  /** `onClose` runs once, on the first `close()`. */
  constructor(
    pageSize: number,
    private readonly onClose?: () => void,
  ) {
    this.queue = new BoundedQueue(pageSize + 1)
  }

  get closed(): boolean {
    return this.controller.signal.aborted
  }

  /** Aborted by `close()`. */
  get signal(): AbortSignal {
    return this.controller.signal
  }

  /** Resolves false when the consumer closed the iterator. */
  push(entry: KeyValue<K, V>): Promise<boolean> {
    return this.queue.put({ kind: "next", value: entry })
  }

  async complete(): Promise<void> {
    await this.queue.put({ kind: "completed" })
  }

  async fail(error: unknown): Promise<void> {
    await this.queue.put({ kind: "failed", error })
  }

  hasNext(): Promise<boolean> {
    return this.mutex.runExclusive(async () => (await this.lookahead()) !== undefined)
  }

  peekNextKey(): Promise<K> {
    return this.mutex.runExclusive(async () => {
      const entry = await this.lookahead()
      if (entry === undefined) throw endOfSequence()

      return entry.key
    })
  }

  next(): Promise<KeyValue<K, V>> {
    return this.mutex.runExclusive(async () => {
      const entry = await this.lookahead()
      if (entry === undefined) throw endOfSequence()

      this.buffered = undefined
      return entry
    })
  }

  close(): void {
    if (this.closed) return

    this.buffered = undefined
    this.queue.close()
    this.controller.abort()
    this.onClose?.()
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<KeyValue<K, V>, void, undefined> {
    try {
      while (await this.hasNext()) {
        yield await this.next()
      }
    } finally {
      this.close()
    }
  }

  private async lookahead(): Promise<KeyValue<K, V> | undefined> {
    if (this.buffered !== undefined) return this.buffered
    if (this.exhausted || this.closed) return undefined

    const notification = await this.queue.take()

    // Closed while waiting.
    if (notification === undefined) return undefined

    switch (notification.kind) {
      case "next":
        this.buffered = notification.value
        return notification.value
      case "completed":
        this.exhausted = true
        return undefined
      case "failed":
        this.exhausted = true
        throw scanFailed(notification.error)
    }
  }
}
