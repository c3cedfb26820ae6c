/**
 * Unit tests for the limiter and keyed lock
 */

import { describe, it, expect } from '@jest/globals';
import { createLimiter, createKeyedLock } from '@/lib/concurrency';

function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createLimiter', () => {
  it('should reject a non-positive limit', () => {
    expect(() => createLimiter(0)).toThrow(RangeError);
    expect(() => createLimiter(1.5)).toThrow(RangeError);
  });

  it('should never run more than limit tasks at once', async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;

    const task = async (): Promise<void> => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
    };

    await Promise.all(Array.from({ length: 6 }, () => limit(task)));

    expect(peak).toBe(2);
  });

  it('should start queued tasks in FIFO order', async () => {
    const limit = createLimiter(1);
    const order: number[] = [];

    await Promise.all([1, 2, 3].map((n) => limit(async () => order.push(n))));

    expect(order).toEqual([1, 2, 3]);
  });

  it('should release the slot when a task throws synchronously', async () => {
    const limit = createLimiter(1);

    await expect(
      limit(() => {
        throw new Error('sync failure');
      }),
    ).rejects.toThrow('sync failure');
    await expect(limit(async () => 'next')).resolves.toBe('next');
  });
});

describe('createKeyedLock', () => {
  it('should serialise tasks with the same key', async () => {
    const lock = createKeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.run('ghcr.io/a:1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lock.run('ghcr.io/a:1', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual([]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('should run tasks with different keys concurrently', async () => {
    const lock = createKeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.run('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await lock.run('b', async () => {
      order.push('b');
    });

    expect(order).toEqual(['b']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['b', 'a']);
  });

  it('should keep the queue going after a failed task', async () => {
    const lock = createKeyedLock();

    const failing = lock.run('k', async () => {
      throw new Error('push failed');
    });
    const next = lock.run('k', async () => 'ok');

    await expect(failing).rejects.toThrow('push failed');
    await expect(next).resolves.toBe('ok');
  });

  it('should forget keys once their tasks settle', async () => {
    const lock = createKeyedLock();

    await lock.run('k', async () => undefined);
    await new Promise((resolve) => setImmediate(resolve));

    expect(lock.size).toBe(0);
  });
});
