interface PendingConsumer<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

/**
 * Bounded single-consumer queue between the turn engine and its caller.
 *
 * `push` resolves once the item is buffered or handed to a waiting consumer,
 * so a slow consumer holds the producer back. When the consumer stops
 * iterating (or the abort signal fires) the channel is cancelled: buffered
 * items are dropped and every later `push` resolves `false`.
 */
export class OutputChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waitingProducers: Array<() => void> = [];
  private consumer?: PendingConsumer<T>;
  private closed = false;
  private cancelled = false;
  private failure?: { error: unknown };

  constructor(
    readonly capacity = 16,
    signal?: AbortSignal,
  ) {
    if (capacity < 1) throw new RangeError("capacity must be at least 1");
    if (signal?.aborted) {
      this.cancel();
    } else {
      signal?.addEventListener("abort", () => this.cancel(), { once: true });
    }
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items buffered and not yet consumed. */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Enqueue an item, waiting while the buffer is full.
   * Resolves `false` when the item was not delivered.
   */
  async push(item: T): Promise<boolean> {
    while (!this.closed && !this.cancelled) {
      if (this.consumer) {
        const consumer = this.consumer;
        this.consumer = undefined;
        consumer.resolve({ value: item, done: false });
        return true;
      }
      if (this.buffer.length < this.capacity) {
        this.buffer.push(item);
        return true;
      }
      await new Promise<void>((resolve) => this.waitingProducers.push(resolve));
    }
    return false;
  }

  /** End the stream once buffered items are consumed. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeProducers();
    if (this.consumer && this.buffer.length === 0) {
      const consumer = this.consumer;
      this.consumer = undefined;
      if (this.failure) {
        consumer.reject(this.failure.error);
      } else {
        consumer.resolve({ value: undefined, done: true });
      }
    }
  }

  /** End the stream with an error, raised after buffered items are consumed. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.close();
  }

  /** Stop delivery: drop buffered items and release the producer. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.buffer.length = 0;
    this.wakeProducers();
    if (this.consumer) {
      const consumer = this.consumer;
      this.consumer = undefined;
      consumer.resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      this.wakeOneProducer();
      return Promise.resolve({ value, done: false });
    }
    if (this.cancelled) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.closed) {
      if (this.failure) {
        const { error } = this.failure;
        this.failure = undefined;
        return Promise.reject(error);
      }
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.consumer) {
      return Promise.reject(new Error("OutputChannel supports a single pending read"));
    }
    return new Promise((resolve, reject) => {
      this.consumer = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.cancel();
        return { value: undefined, done: true };
      },
    };
  }

  private wakeOneProducer(): void {
    this.waitingProducers.shift()?.();
  }

  private wakeProducers(): void {
    for (const wake of this.waitingProducers.splice(0)) wake();
  }
}
