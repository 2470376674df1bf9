import { describe, it, expect } from 'vitest';
import { Mutex } from './mutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe('Mutex', () => {
  it('runs exclusive sections one at a time, in arrival order', async () => {
    const mutex = new Mutex('test');
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive(async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(mutex.stats()).toEqual({ name: 'test', locked: true, queued: 1 });

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.stats().locked).toBe(false);
  });

  it('releases the lock when the section throws', async () => {
    const mutex = new Mutex('test');
    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(mutex.stats().locked).toBe(false);
  });

  it('ignores a second call to the same release', async () => {
    const mutex = new Mutex('test');
    const release = await mutex.acquire();
    release();
    const again = await mutex.acquire();
    release();
    expect(mutex.stats().locked).toBe(true);
    again();
    expect(mutex.stats().locked).toBe(false);
  });
});
