type Waiter<T> = {
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
};

/**
 * Buffers items pushed from event callbacks for a consumer that awaits them
 * one at a time. Once failed, every pending and later dequeue rejects.
 */
export class EventQueue<T> {
  private queue: T[] = [];
  private waiter: Waiter<T> | null = null;
  private failure: { err: unknown } | null = null;

  get size(): number {
    return this.queue.length;
  }

  push(item: T): void {
    if (this.failure) return;
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w.resolve(item);
    } else {
      this.queue.push(item);
    }
  }

  /** Rejects the pending dequeue, and every later one once the buffer drains. */
  fail(err: unknown): void {
    if (this.failure) return;
    this.failure = { err };
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w.reject(err);
    }
  }

  async dequeue(): Promise<T> {
    const ready = this.take();
    if (ready) return ready.item;
    if (this.failure) throw this.failure.err;
    return new Promise<T>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  /** Returns next item or null after timeoutMs. */
  async tryDequeue(timeoutMs: number): Promise<T | null> {
    const ready = this.take();
    if (ready) return ready.item;
    if (this.failure) throw this.failure.err;
    return new Promise<T | null>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = {
        resolve: (value: T) => {
          clearTimeout(timer);
          resolve(value);
        },
        reject: (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      };
    });
  }

  private take(): { item: T } | null {
    if (this.queue.length === 0) return null;
    const [item, ...rest] = this.queue;
    this.queue = rest;
    return { item };
  }
}
