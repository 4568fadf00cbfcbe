/**
 * Bounded in-process FIFO queue with timed takes.
 *
 * `offer` never blocks: it returns false when the queue is at capacity so the
 * producer can fail fast. `take` waits up to `timeoutMs` for an item and
 * resolves `undefined` on timeout or once the queue is closed.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  constructor(public readonly capacity: number) {
    if (capacity < 1) {
      throw new RangeError(`Queue capacity must be positive, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  offer(item: T): boolean {
    if (this.closed || this.items.length >= this.capacity) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  take(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      const waiter = (item: T | undefined): void => {
        clearTimeout(timer);
        resolve(item);
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(undefined);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything still queued */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  /** Refuse further offers and wake every waiting taker */
  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter(undefined);
    }
  }
}
