/**
 * FIFO channel of job ids. Consumers wait in `take()` until an id arrives or
 * the channel is closed.
 */
export class JobQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | null) => void> = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed queue');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Resolves with the oldest item, or null once the queue is closed and drained
   */
  take(): Promise<T | null> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  has(item: T): boolean {
    return this.items.includes(item);
  }

  remove(item: T): boolean {
    const index = this.items.indexOf(item);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  /**
   * Stops accepting items and wakes idle consumers. Queued items are dropped.
   */
  close(): T[] {
    this.closed = true;
    const dropped = this.items;
    this.items = [];
    for (const waiter of this.waiters) {
      waiter(null);
    }
    this.waiters = [];
    return dropped;
  }
}
