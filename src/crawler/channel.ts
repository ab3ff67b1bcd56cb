const COMPACT_THRESHOLD = 1024;

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbounded multi-producer, multi-consumer channel. Receivers suspend while it
 * is empty; once closed, buffered items are still delivered and every later
 * receive completes with `done`.
 */
export class Channel<T> implements AsyncIterableIterator<T> {
  private buffer: T[] = [];
  // Index of the oldest undelivered item; the consumed prefix is dropped in bulk.
  private head = 0;
  private readonly receivers: Receiver<T>[] = [];
  private closed = false;

  send(item: T): void {
    if (this.closed) {
      throw new Error('Cannot send on a closed channel');
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value: item });
    } else {
      this.buffer.push(item);
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.head < this.buffer.length) {
      const value = this.buffer[this.head];
      this.head += 1;
      this.compact();
      return Promise.resolve({ done: false, value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    // Receivers only wait on an empty buffer, so nothing is lost here.
    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true, value: undefined });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length - this.head;
  }

  private compact(): void {
    if (this.head === this.buffer.length) {
      this.buffer = [];
      this.head = 0;
    } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 > this.buffer.length) {
      this.buffer = this.buffer.slice(this.head);
      this.head = 0;
    }
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
