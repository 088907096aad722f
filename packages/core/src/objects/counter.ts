import { Mutex } from '../util/mutex.js';

/**
 * Outstanding-task counter for one field.
 *
 * Tasks targeting the field hold its lock while they run; the counter
 * drops by one as each task finishes, and `wait` resolves once it is zero.
 */
export class FieldCounter {
  private count = 0;
  private readonly mutex = new Mutex();
  private waiters: Array<() => void> = [];

  increment(): void {
    this.count += 1;
  }

  lock(): Promise<void> {
    return this.mutex.acquire();
  }

  /** Release the lock and mark one task finished. */
  unlock(): void {
    this.mutex.release();
    this.settle();
  }

  /** Mark one task finished that was never dispatched. */
  abandon(): void {
    this.settle();
  }

  wait(): Promise<void> {
    if (this.count === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private settle(): void {
    this.count = Math.max(0, this.count - 1);
    if (this.count > 0) return;
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }
}

export class CounterSet {
  private readonly counters = new Map<string, FieldCounter>();

  increment(key: string): void {
    let counter = this.counters.get(key);
    if (!counter) {
      counter = new FieldCounter();
      this.counters.set(key, counter);
    }
    counter.increment();
  }

  async lock(key: string): Promise<void> {
    await this.counters.get(key)?.lock();
  }

  unlock(key: string): void {
    this.counters.get(key)?.unlock();
  }

  abandon(key: string): void {
    this.counters.get(key)?.abandon();
  }

  /** Resolves once every listed key has settled; unknown keys are skipped. */
  async wait(keys: Iterable<string>): Promise<void> {
    const pending: Promise<void>[] = [];
    for (const key of keys) {
      const counter = this.counters.get(key);
      if (counter) pending.push(counter.wait());
    }
    await Promise.all(pending);
  }
}
