/**
 * Keyed mutex tests
 */

import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../../resilience/keyed-mutex.js';

const tick = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('KeyedMutex', () => {
  it('runs work for one key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: number[] = [];

    await Promise.all([
      mutex.runExclusive('k', async () => {
        await tick(15);
        order.push(1);
      }),
      mutex.runExclusive('k', async () => {
        await tick(1);
        order.push(2);
      }),
      mutex.runExclusive('k', async () => {
        order.push(3);
      }),
    ]);

    expect(order).toEqual([1, 2, 3]);
  });

  it('lets different keys overlap', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('a', async () => {
        await tick(15);
        order.push('a');
      }),
      mutex.runExclusive('b', async () => {
        order.push('b');
      }),
    ]);

    expect(order).toEqual(['b', 'a']);
  });

  it('returns a rejection to its caller only', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive('k', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('k', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('releases the key once the queue drains', async () => {
    const mutex = new KeyedMutex();

    const pending = mutex.runExclusive('k', async () => tick(5));
    expect(mutex.isLocked('k')).toBe(true);

    await pending;
    expect(mutex.isLocked('k')).toBe(false);
  });
});
