/**
 * Concurrency primitives for the orchestrator: a bounded limiter for builds
 * and pushes, and a keyed lock that serialises work on the same target.
 */

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * At most `limit` tasks run at once; the rest wait in FIFO order.
 */
export function createLimiter(limit: number): Limiter {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const release = (): void => {
    active--;
    const next = queue.shift();
    if (next) next();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const run = (): void => {
        active++;
        void Promise.resolve().then(task).then(resolve, reject).finally(release);
      };
      if (active < limit) {
        run();
      } else {
        queue.push(run);
      }
    });
}

export interface KeyedLock {
  /** Run `task` once every earlier task holding `key` has settled */
  run<T>(key: string, task: () => Promise<T>): Promise<T>;
  /** Number of keys with a task in flight or queued */
  readonly size: number;
}

export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return {
    run<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      const result = previous.then(task);
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
    get size() {
      return tails.size;
    },
  };
}
