/**
 * Unbounded single-consumer queue. Producers `push`, the consumer drains it
 * with `for await`; `close` ends iteration once queued items are delivered.
 */
export class Channel<T> implements AsyncIterable<T> {
  private items: Array<{ value: T }> = [];
  private waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  push(item: T): boolean {
    if (this.closed) return false;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter({ value: item, done: false });
      return true;
    }
    this.items.push({ value: item });
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const queued = this.items.shift();
    if (queued) return Promise.resolve({ value: queued.value, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    if (this.waiter) return Promise.reject(new Error("channel already has a consumer"));
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
