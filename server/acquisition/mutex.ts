/**
 * Promise-chain mutex. Callers queue in arrival order; each waits for the
 * previous holder to settle before its own function runs.
 */

export interface Mutex {
  runExclusive<T>(fn: () => Promise<T>): Promise<T>;
  isLocked(): boolean;
}

export function createMutex(): Mutex {
  let lock: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    runExclusive<T>(fn: () => Promise<T>): Promise<T> {
      const previousLock = lock;
      let releaseLock: () => void = () => {};
      lock = new Promise<void>(resolve => {
        releaseLock = resolve;
      });
      pending++;
      return previousLock.then(fn).finally(() => {
        pending--;
        releaseLock();
      });
    },

    isLocked(): boolean {
      return pending > 0;
    },
  };
}
