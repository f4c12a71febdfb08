/**
 * Bounded FIFO between a run's producer (the executor) and at most one
 * stream consumer. On overflow the oldest buffered item is dropped.
 *
 * @module @nodeflow/engine/run/event-channel
 */

type Waiter<T> = (item: T | null) => void;

export class EventChannel<T> {
  private buffer: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private closed = false;
  private dropped = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Items dropped on overflow so far */
  get droppedCount(): number {
    return this.dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Hand the item to a waiting consumer, or buffer it. Returns false when
   * buffering dropped the oldest item.
   */
  push(item: T): boolean {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel');
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    this.buffer.push(item);
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
      this.dropped++;
      return false;
    }
    return true;
  }

  /**
   * Next item, waiting up to `timeoutMs`. Resolves null on timeout, on abort,
   * or once the channel is closed and drained. An aborted wait takes nothing
   * from the channel.
   */
  next(timeoutMs: number, signal?: AbortSignal): Promise<T | null> {
    if (signal?.aborted) {
      return Promise.resolve(null);
    }
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift() ?? null);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      const settle = (item: T | null): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      const waiter: Waiter<T> = settle;
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        settle(null);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        settle(null);
      }, timeoutMs);
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Stop accepting items and wake every waiter with null. Buffered items
   * stay readable.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(null);
  }
}
