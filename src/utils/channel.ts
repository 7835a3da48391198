/**
 * Single-consumer queue: producers push, one `for await` drains.
 * Once `capacity` items are buffered, `push` resolves only after the
 * consumer takes one, so a slow consumer slows the producers down.
 * Iteration ends once the channel is closed and the buffer is empty.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiting: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private readonly blocked: Array<() => void> = [];
  private isClosed = false;

  constructor(private readonly capacity = Number.POSITIVE_INFINITY) {}

  get closed(): boolean {
    return this.isClosed;
  }

  async push(item: T): Promise<void> {
    if (this.isClosed) {
      throw new Error('Cannot push to a closed channel');
    }

    const waiter = this.waiting.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return;
    }

    this.buffer.push(item);
    if (this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.blocked.push(resolve));
    }
  }

  /** Ends iteration and releases blocked producers; items pushed later are rejected. */
  close(): void {
    this.isClosed = true;
    for (const waiter of this.waiting.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    for (const release of this.blocked.splice(0)) {
      release();
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      this.blocked.shift()?.();
      return Promise.resolve({ value: item, done: false });
    }
    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
