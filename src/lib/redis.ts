/**
 * Upstash Redis Client Configuration
 * Backs the cross-instance entity lock
 */

import { Redis } from '@upstash/redis';
import { nanoid } from 'nanoid';

import type { EntityLock } from './entity-lock.js';

/**
 * The two Redis commands the lock needs
 * (injectable for testing)
 */
export interface LockStore {
  set(
    key: string,
    value: string,
    options: { nx: true; px: number }
  ): Promise<string | null>;
  eval(script: string, keys: string[], args: string[]): Promise<unknown>;
}

export interface RedisLockOptions {
  /**
   * Lock expiry, so a crashed holder cannot block the key forever
   */
  ttlMs: number;
  /**
   * Give up acquiring after this long
   */
  acquireTimeoutMs: number;
  retryDelayMs: number;
  keyPrefix: string;
}

export const DEFAULT_REDIS_LOCK_OPTIONS: RedisLockOptions = {
  ttlMs: 10_000,
  acquireTimeoutMs: 5_000,
  retryDelayMs: 50,
  keyPrefix: 'lock:',
};

// Delete only if we still own the lock
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

/**
 * Create an Upstash client from configuration
 */
export function createRedis(url: string, token: string): Redis {
  return new Redis({ url, token });
}

/**
 * Adapt an Upstash client to the LockStore shape
 */
export function createUpstashLockStore(redis: Redis): LockStore {
  return {
    async set(key, value, options) {
      const reply = await redis.set<string>(key, value, options);
      return reply === null ? null : String(reply);
    },
    eval(script, keys, args) {
      return redis.eval(script, keys, args);
    },
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create an entity lock held in Redis (SET NX PX + owner-checked release)
 */
export function createRedisEntityLock(
  store: LockStore,
  options: Partial<RedisLockOptions> = {}
): EntityLock {
  const settings = { ...DEFAULT_REDIS_LOCK_OPTIONS, ...options };

  async function acquire(lockKey: string, token: string): Promise<void> {
    const deadline = Date.now() + settings.acquireTimeoutMs;
    for (;;) {
      const reply = await store.set(lockKey, token, {
        nx: true,
        px: settings.ttlMs,
      });
      if (reply !== null) {
        return;
      }
      if (Date.now() >= deadline) {
        throw new Error(`Timed out acquiring lock ${lockKey}`);
      }
      await delay(settings.retryDelayMs);
    }
  }

  return {
    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
      const lockKey = `${settings.keyPrefix}${key}`;
      const token = nanoid();
      await acquire(lockKey, token);
      try {
        return await task();
      } finally {
        await store.eval(RELEASE_SCRIPT, [lockKey], [token]);
      }
    },
  };
}
