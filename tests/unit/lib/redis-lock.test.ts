/**
 * Redis entity lock tests
 * Runs against an in-process LockStore
 */

import { describe, it, expect } from 'vitest';

import type { LockStore } from '@/lib/redis.js';
import { createRedisEntityLock } from '@/lib/redis.js';

interface FakeLockStore extends LockStore {
  values: Map<string, string>;
  setCalls: Array<{ key: string; px: number }>;
}

function createFakeLockStore(): FakeLockStore {
  const values = new Map<string, string>();
  const setCalls: Array<{ key: string; px: number }> = [];

  return {
    values,
    setCalls,
    async set(key, value, options) {
      setCalls.push({ key, px: options.px });
      if (values.has(key)) {
        return null;
      }
      values.set(key, value);
      return 'OK';
    },
    async eval(_script, keys, args) {
      const [key] = keys;
      const [token] = args;
      if (key !== undefined && values.get(key) === token) {
        values.delete(key);
        return 1;
      }
      return 0;
    },
  };
}

describe('createRedisEntityLock', () => {
  it('should hold the prefixed key while the task runs', async () => {
    const store = createFakeLockStore();
    const lock = createRedisEntityLock(store, { ttlMs: 2000 });

    const held = await lock.runExclusive('order:1', async () =>
      store.values.has('lock:order:1')
    );

    expect(held).toBe(true);
    expect(store.setCalls).toEqual([{ key: 'lock:order:1', px: 2000 }]);
    expect(store.values.size).toBe(0);
  });

  it('should release the key when the task throws', async () => {
    const store = createFakeLockStore();
    const lock = createRedisEntityLock(store);

    await expect(
      lock.runExclusive('order:1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(store.values.has('lock:order:1')).toBe(false);
  });

  it('should give up when the key stays taken', async () => {
    const store = createFakeLockStore();
    store.values.set('locks/order:1', 'someone-else');
    const lock = createRedisEntityLock(store, {
      acquireTimeoutMs: 0,
      keyPrefix: 'locks/',
    });

    await expect(
      lock.runExclusive('order:1', async () => 'never')
    ).rejects.toThrow('Timed out acquiring lock locks/order:1');
    expect(store.values.get('locks/order:1')).toBe('someone-else');
  });

  it('should wait for the holder to release', async () => {
    const store = createFakeLockStore();
    const lock = createRedisEntityLock(store, { retryDelayMs: 1 });
    const order: string[] = [];

    await Promise.all([
      lock.runExclusive('order:1', async () => {
        order.push('a:start');
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push('a:end');
      }),
      lock.runExclusive('order:1', async () => {
        order.push('b');
      }),
    ]);

    expect(order).toEqual(['a:start', 'a:end', 'b']);
  });

  it('should not delete a key taken over by another owner', async () => {
    const store = createFakeLockStore();
    const lock = createRedisEntityLock(store);

    await lock.runExclusive('order:1', async () => {
      store.values.set('lock:order:1', 'new-owner');
    });

    expect(store.values.get('lock:order:1')).toBe('new-owner');
  });
});
