/**
 * Bounded single-consumer queue for progress updates.
 * Producers never wait: an offer to a full queue is dropped.
 */
export class ProgressChannel<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private waiting?: (result: IteratorResult<T>) => void;
  private closed = false;

  constructor(readonly capacity = 10) {}

  /**
   * Enqueue without blocking
   * @returns false when the value was dropped
   */
  offer(value: T): boolean {
    if (this.closed) return false;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve({ value, done: false });
      return true;
    }

    if (this.queue.length >= this.capacity) {
      return false;
    }

    this.queue.push(value);
    return true;
  }

  /**
   * Stop accepting values. Buffered values are still delivered.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve({ value: undefined, done: true });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  next(): Promise<IteratorResult<T>> {
    if (this.queue.length > 0) {
      const [value] = this.queue.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
