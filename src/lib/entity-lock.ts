/**
 * Entity Locks
 *
 * Serializes writers per entity key ("order:<id>", "subscription:<id>").
 * The local lock covers a single process; the Redis lock in ./redis.ts
 * covers several instances sharing one database.
 */

export interface EntityLock {
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;
}

/**
 * In-process keyed lock: tasks for the same key run one after another,
 * tasks for different keys run concurrently
 */
export function createLocalEntityLock(): EntityLock {
  const tails = new Map<string, Promise<void>>();

  return {
    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();

      let release: () => void = () => undefined;
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await task();
      } finally {
        release();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },
  };
}
