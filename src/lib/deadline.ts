/**
 * Deadlines and cancellation for long-running operations.
 *
 * Every build, login and push runs under a deadline linked to the run's
 * abort signal. When either fires, the operation's own signal is aborted so
 * the engine request or child process is torn down.
 */

export type DeadlineOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'timeout' }
  | { status: 'cancelled' };

export interface DeadlineOptions {
  /** Milliseconds before the operation is abandoned; non-positive disables the deadline */
  timeoutMs: number;
  /** Parent signal (run cancellation) */
  signal?: AbortSignal;
}

export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation exceeded its ${timeoutMs}ms deadline`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Run `task` with a deadline. The task receives a signal that aborts on
 * timeout or on parent cancellation; once the outcome is decided, a late
 * rejection from the task is ignored.
 */
export function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<DeadlineOutcome<T>> {
  const { timeoutMs, signal } = options;
  if (signal?.aborted) {
    return Promise.resolve({ status: 'cancelled' });
  }

  const controller = new AbortController();

  return new Promise<DeadlineOutcome<T>>((resolve, reject) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const cleanup = (): void => {
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    const onAbort = (): void => {
      if (settled) return;
      cleanup();
      resolve({ status: 'cancelled' });
      controller.abort(signal?.reason);
    };

    if (timeoutMs > 0 && Number.isFinite(timeoutMs)) {
      timer = setTimeout(() => {
        if (settled) return;
        cleanup();
        resolve({ status: 'timeout' });
        controller.abort(new DeadlineExceededError(timeoutMs));
      }, timeoutMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    let running: Promise<T>;
    try {
      running = task(controller.signal);
    } catch (error) {
      cleanup();
      reject(error);
      return;
    }

    running.then(
      (value) => {
        if (settled) return;
        cleanup();
        resolve({ status: 'completed', value });
      },
      (error: unknown) => {
        // Outcome already reported as timeout or cancellation
        if (settled) return;
        cleanup();
        reject(error);
      },
    );
  });
}

/**
 * Wait `ms` milliseconds. Resolves `false` early if the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  if (ms <= 0) return Promise.resolve(true);

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
