import { ResourceClosedError, TimeoutError } from "./errors";

export interface Versioned<T> {
  value: T;
  /** Increases by one on every publish, starting at 1. */
  version: number;
}

export interface NextOptions {
  /** Resolve with the first value newer than this version (default 0). */
  after?: number;
  timeoutMs?: number;
}

type Waiter<T> = {
  after: number;
  resolve: (value: Versioned<T>) => void;
  reject: (error: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
};

/**
 * Single-slot channel: each publish overwrites the previous value. Readers
 * never block the writer and only ever see the newest value.
 */
export class LatestValueChannel<T> {
  private current?: Versioned<T>;
  private readonly waiters = new Set<Waiter<T>>();
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  publish(value: T): number {
    if (this.isClosed) throw new ResourceClosedError("Channel");
    const entry = { value, version: (this.current?.version ?? 0) + 1 };
    this.current = entry;
    for (const waiter of this.waiters) {
      if (entry.version > waiter.after) this.settle(waiter).resolve(entry);
    }
    return entry.version;
  }

  latest(): Versioned<T> | undefined {
    return this.current;
  }

  next(options: NextOptions = {}): Promise<Versioned<T>> {
    const after = options.after ?? 0;
    if (this.current && this.current.version > after) return Promise.resolve(this.current);
    if (this.isClosed) return Promise.reject(new ResourceClosedError("Channel"));

    return new Promise((resolve, reject) => {
      const waiter: Waiter<T> = { after, resolve, reject };
      this.waiters.add(waiter);
      if (options.timeoutMs !== undefined) {
        waiter.timeoutId = setTimeout(() => {
          this.settle(waiter).reject(new TimeoutError(`Timed out waiting for a value after version ${after}`));
        }, options.timeoutMs);
      }
    });
  }

  /** Pending and future `next` calls without a newer value reject with ResourceClosedError. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const waiter of this.waiters) {
      this.settle(waiter).reject(new ResourceClosedError("Channel"));
    }
  }

  private settle(waiter: Waiter<T>): Waiter<T> {
    if (waiter.timeoutId) clearTimeout(waiter.timeoutId);
    this.waiters.delete(waiter);
    return waiter;
  }
}
