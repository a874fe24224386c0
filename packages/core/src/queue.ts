/**
 * Unbounded FIFO hand-off between one producer and one consumer.
 */
export class MessageQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  /**
   * Enqueue an item. Returns false once the queue is closed.
   */
  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Stop accepting items. Items already queued are still delivered.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items waiting to be taken. */
  get size(): number {
    return this.items.length;
  }

  /**
   * Take the next item, waiting for one if the queue is empty.
   * Resolves `done` once the queue is closed and drained.
   */
  next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
