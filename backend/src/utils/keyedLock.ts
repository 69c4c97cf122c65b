// backend/src/utils/keyedLock.ts

export type KeyedLock = {
  run<T>(key: string, task: () => Promise<T>): Promise<T>;
  pendingKeys(): number;
};

/**
 * Runs tasks that share a key one after another, in arrival order.
 * Tasks on different keys do not wait for each other.
 */
export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return {
    run<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      const result = previous.then(task);

      // The tail settles either way so one failed task does not block the key.
      const tail = result.then(
        () => undefined,
        () => undefined,
      );
      tails.set(key, tail);

      void tail.then(() => {
        if (tails.get(key) === tail) tails.delete(key);
      });

      return result;
    },

    pendingKeys() {
      return tails.size;
    },
  };
}
