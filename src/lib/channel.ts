type ChannelItem<T> = { done: false; value: T } | { done: true };

/**
 * Unbounded single-consumer queue that is read with `for await`.
 * After `close()` pushes are refused; items already buffered are still delivered.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private buffer: Array<ChannelItem<T>> = [];
  private waiters: Array<(item: ChannelItem<T>) => void> = [];
  private closed = false;

  push(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const item: ChannelItem<T> = { done: false, value };
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.waiters) {
      waiter({ done: true });
    }
    this.waiters = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  private take(): Promise<ChannelItem<T>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.resolve({ done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.take();
      if (item.done) {
        return;
      }
      yield item.value;
    }
  }
}
