import { describe, expect, it } from 'vitest';

import { Mutex } from '../mutex.js';

describe('Mutex', () => {
  it('grants the lock in acquisition order', async () => {
    const mutex = new Mutex();
    const order: number[] = [];
    await mutex.acquire();
    const second = mutex.acquire().then(() => order.push(2));
    const third = mutex.acquire().then(() => order.push(3));
    order.push(1);
    mutex.release();
    await second;
    mutex.release();
    await third;
    mutex.release();
    expect(order).toEqual([1, 2, 3]);
    await expect(mutex.runExclusive(() => 'free')).resolves.toBe('free');
  });

  it('runExclusive serializes critical sections', async () => {
    const mutex = new Mutex();
    let active = 0;
    let maxActive = 0;
    const section = async (): Promise<void> => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active -= 1;
    };
    await Promise.all([
      mutex.runExclusive(section),
      mutex.runExclusive(section),
      mutex.runExclusive(section),
    ]);
    expect(maxActive).toBe(1);
  });

  it('releases when the section throws', async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive(() => 'free')).resolves.toBe('free');
  });

  it('rejects a release without a holder', () => {
    expect(() => new Mutex().release()).toThrow('Mutex released while not held');
  });
});
