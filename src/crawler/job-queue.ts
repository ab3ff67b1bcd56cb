import { Channel } from './channel.js';

/** A counted claim on the queue staying open. Releasing twice is a no-op. */
export interface QueueHandle {
  release(): void;
}

/**
 * Work queue that closes itself when the last handle is released.
 *
 * Every queued or running job holds a handle, and so does whoever seeds the
 * queue. A parent job acquires its children's handles before releasing its
 * own, so the count only reaches zero once nothing is queued and nothing is
 * running: the frontier is exhausted.
 */
export class JobQueue<T> {
  private readonly channel = new Channel<T>();
  private readonly closeListeners: Array<() => void> = [];
  private handles = 0;

  acquire(): QueueHandle {
    if (this.channel.isClosed) {
      throw new Error('Cannot acquire a handle on a closed job queue');
    }
    this.handles += 1;

    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.handles -= 1;
        if (this.handles === 0) {
          this.close();
        }
      },
    };
  }

  push(job: T): void {
    this.channel.send(job);
  }

  /** Next job, or `undefined` once the queue has closed and drained. */
  async pull(): Promise<T | undefined> {
    const result = await this.channel.next();
    return result.done ? undefined : result.value;
  }

  onClose(listener: () => void): void {
    if (this.channel.isClosed) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }

  get isClosed(): boolean {
    return this.channel.isClosed;
  }

  get pending(): number {
    return this.channel.size;
  }

  get activeHandles(): number {
    return this.handles;
  }

  private close(): void {
    this.channel.close();
    for (const listener of this.closeListeners.splice(0)) {
      listener();
    }
  }
}
