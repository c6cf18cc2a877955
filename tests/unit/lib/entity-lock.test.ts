/**
 * Local entity lock tests
 */

import { describe, it, expect } from 'vitest';

import { createLocalEntityLock } from '@/lib/entity-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createLocalEntityLock', () => {
  it('should run tasks for the same key one after another', async () => {
    const lock = createLocalEntityLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('order:1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.runExclusive('order:1', async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not block tasks for different keys', async () => {
    const lock = createLocalEntityLock();
    const gate = deferred();
    const events: string[] = [];

    const blocked = lock.runExclusive('order:1', async () => {
      await gate.promise;
      events.push('order:1');
    });
    await lock.runExclusive('order:2', async () => {
      events.push('order:2');
    });
    gate.resolve();
    await blocked;

    expect(events).toEqual(['order:2', 'order:1']);
  });

  it('should release the key when a task throws', async () => {
    const lock = createLocalEntityLock();

    await expect(
      lock.runExclusive('subscription:1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(
      lock.runExclusive('subscription:1', async () => 'next')
    ).resolves.toBe('next');
  });
});
