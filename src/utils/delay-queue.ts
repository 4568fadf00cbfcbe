import { Clock, systemClock } from '../types/notification.types';

interface DelayedItem<T> {
  item: T;
  dueAt: number;
}

/**
 * Bounded queue whose items become available at a due time.
 * Items are kept ordered by due time; equal due times keep insertion order.
 */
export class DelayQueue<T> {
  private readonly items: DelayedItem<T>[] = [];
  private readonly wakers = new Set<() => void>();
  private closed = false;

  constructor(
    public readonly capacity: number,
    private readonly clock: Clock = systemClock
  ) {
    if (capacity < 1) {
      throw new RangeError(`Queue capacity must be positive, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  offer(item: T, dueAt: Date): boolean {
    if (this.closed || this.items.length >= this.capacity) {
      return false;
    }
    const due = dueAt.getTime();
    let index = this.items.length;
    while (index > 0 && this.items[index - 1].dueAt > due) {
      index--;
    }
    this.items.splice(index, 0, { item, dueAt: due });
    this.wakeAll();
    return true;
  }

  /**
   * Wait up to `timeoutMs` for the earliest item to fall due.
   * Resolves `undefined` on timeout or when the queue is closed.
   */
  async take(timeoutMs: number): Promise<T | undefined> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      if (this.closed) {
        return undefined;
      }

      const head = this.items[0];
      const now = this.clock().getTime();
      if (head && head.dueAt <= now) {
        this.items.shift();
        return head.item;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return undefined;
      }
      await this.waitForChange(head ? Math.min(remaining, head.dueAt - now) : remaining);
    }
  }

  drain(): T[] {
    return this.items.splice(0, this.items.length).map((entry) => entry.item);
  }

  close(): void {
    this.closed = true;
    this.wakeAll();
  }

  private waitForChange(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        this.wakers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, Math.max(ms, 1));
      this.wakers.add(wake);
    });
  }

  private wakeAll(): void {
    for (const wake of [...this.wakers]) {
      wake();
    }
  }
}
