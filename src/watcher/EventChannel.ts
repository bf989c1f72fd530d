interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: Error) => void;
}

/**
 * Unbounded FIFO between a push-based producer and an async consumer.
 * Items pushed before `fail` or `close` are still delivered; after that
 * the consumer sees the failure or the end of the stream.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure?: Error;

  push(item: T): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  fail(error: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = error;
    this.waiters.splice(0).forEach(w => w.reject(error));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.waiters.splice(0).forEach(w => w.resolve({ value: undefined, done: true }));
  }

  pull(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }

    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) return Promise.resolve({ value: undefined, done: true });

    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.pull() };
  }
}
