/**
 * Unbounded single-consumer queue bridging producer callbacks and an async iterator.
 *
 * Producers call {@link Channel.push}; the consumer pulls with {@link Channel.next} or `for await`.
 * Items are delivered in push order.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly _buffer: T[] = []
  private _pending: { resolve: (result: IteratorResult<T, undefined>) => void; reject: (error: Error) => void } | null =
    null
  private _closed = false
  private _error: Error | null = null

  /**
   * Number of items pushed but not yet consumed.
   */
  get size(): number {
    return this._buffer.length
  }

  /**
   * Whether the channel accepts no further items.
   */
  get closed(): boolean {
    return this._closed
  }

  /**
   * Enqueues an item, handing it straight to a waiting consumer if there is one.
   */
  push(item: T): void {
    if (this._closed) {
      throw new Error('Cannot push to a closed channel')
    }
    if (this._pending) {
      const { resolve } = this._pending
      this._pending = null
      resolve({ value: item, done: false })
      return
    }
    this._buffer.push(item)
  }

  /**
   * Marks the end of the stream. Buffered items are still delivered.
   */
  close(): void {
    this._closed = true
    if (this._pending) {
      const { resolve } = this._pending
      this._pending = null
      resolve({ value: undefined, done: true })
    }
  }

  /**
   * Ends the stream with an error, raised once the buffered items are drained.
   */
  fail(error: Error): void {
    this._error = error
    this._closed = true
    if (this._pending) {
      const { reject } = this._pending
      this._pending = null
      reject(error)
    }
  }

  /**
   * Resolves with the next item, or `done` once the channel is closed and drained.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    if (this._buffer.length > 0) {
      const value = this._buffer.shift()
      if (value !== undefined) {
        return Promise.resolve({ value, done: false })
      }
    }
    if (this._error) {
      return Promise.reject(this._error)
    }
    if (this._closed) {
      return Promise.resolve({ value: undefined, done: true })
    }
    if (this._pending) {
      return Promise.reject(new Error('Channel supports a single pending consumer'))
    }
    return new Promise((resolve, reject) => {
      this._pending = { resolve, reject }
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
    }
  }
}
