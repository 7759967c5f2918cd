/**
 * Mutex Tests
 */

import { describe, it, expect } from 'vitest';
import { Mutex } from '../../../src/core/mutex';

describe('Mutex', () => {
  it('should lock and unlock', async () => {
    const mutex = new Mutex();

    await mutex.acquire();
    expect(mutex.isLocked()).toBe(true);

    mutex.release();
    expect(mutex.isLocked()).toBe(false);
  });

  it('should throw when releasing an unlocked mutex', () => {
    expect(() => new Mutex().release()).toThrow('Mutex.release() called while not locked');
  });

  it('should grant the lock to waiters in FIFO order', async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    await mutex.acquire();
    const waiters = [1, 2, 3].map((n) =>
      mutex.acquire().then(() => {
        order.push(n);
        mutex.release();
      }),
    );
    expect(mutex.pending).toBe(3);

    mutex.release();
    await Promise.all(waiters);

    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked()).toBe(false);
    expect(mutex.pending).toBe(0);
  });

  it('should never run exclusive operations concurrently', async () => {
    const mutex = new Mutex();
    let running = 0;
    let maxRunning = 0;

    await Promise.all(
      Array.from({ length: 10 }, () =>
        mutex.runExclusive(async () => {
          running++;
          maxRunning = Math.max(maxRunning, running);
          await new Promise((resolve) => setTimeout(resolve, 1));
          running--;
        }),
      ),
    );

    expect(maxRunning).toBe(1);
  });

  it('should release the lock when the operation throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(mutex.isLocked()).toBe(false);
  });
});
