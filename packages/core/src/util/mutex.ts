/**
 * FIFO async mutex. Holders are resumed in acquisition order.
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    if (!this.locked) {
      throw new Error('Mutex released while not held');
    }
    const next = this.waiters.shift();
    if (next) {
      // Ownership passes directly to the next waiter.
      next();
      return;
    }
    this.locked = false;
  }

  async runExclusive<R>(fn: () => R | Promise<R>): Promise<R> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
