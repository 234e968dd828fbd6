type Waiter<T> = {
  match: (item: T) => boolean;
  resolve: (item: T | null) => void;
  timeout: NodeJS.Timeout | null;
};

export type AsyncQueueOptions<T> = {
  /** Oldest items are dropped past this size. Unbounded when omitted. */
  maxSize?: number;
  onDrop?: (item: T) => void;
};

/**
 * FIFO shared between a producer callback (socket or bus handler) and an
 * async consumer. Consumers wait with a timeout instead of polling; a pushed
 * item goes straight to the oldest waiter whose predicate accepts it.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  constructor(private readonly options: AsyncQueueOptions<T> = {}) {}

  get size() {
    return this.items.length;
  }

  push(item: T) {
    if (this.closed) {
      return;
    }
    const idx = this.waiters.findIndex((waiter) => waiter.match(item));
    if (idx >= 0) {
      const [waiter] = this.waiters.splice(idx, 1);
      if (waiter.timeout) {
        clearTimeout(waiter.timeout);
      }
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
    const maxSize = this.options.maxSize;
    while (maxSize !== undefined && this.items.length > maxSize) {
      const dropped = this.items.shift();
      if (dropped !== undefined) {
        this.options.onDrop?.(dropped);
      }
    }
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  receive(timeoutMs: number): Promise<T | null> {
    return this.take(() => true, timeoutMs);
  }

  /**
   * Removes and returns the first queued item accepted by `match`, waiting up
   * to `timeoutMs` for one to arrive. Items that do not match keep their
   * position. Resolves `null` on timeout or close.
   */
  take(match: (item: T) => boolean, timeoutMs: number): Promise<T | null> {
    const idx = this.items.findIndex(match);
    if (idx >= 0) {
      const [item] = this.items.splice(idx, 1);
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise<T | null>((resolve) => {
      const waiter: Waiter<T> = { match, resolve, timeout: null };
      waiter.timeout = setTimeout(() => {
        const pos = this.waiters.indexOf(waiter);
        if (pos >= 0) {
          this.waiters.splice(pos, 1);
        }
        resolve(null);
      }, Math.max(0, timeoutMs));
      this.waiters.push(waiter);
    });
  }

  close() {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timeout) {
        clearTimeout(waiter.timeout);
      }
      waiter.resolve(null);
    }
  }
}
