/**
 * Async Utilities
 *
 * Timer helpers shared by connect attempts and liveness probes.
 */

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Error raised when an awaited operation is cancelled through its AbortSignal.
 */
export class OperationAbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'OperationAbortedError';
  }
}

/**
 * Races `promise` against a timer. The timer is always cleared, and an abort
 * on `signal` rejects immediately with OperationAbortedError.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationAbortedError());
      return;
    }

    const onAbort = (): void => {
      cleanup();
      reject(new OperationAbortedError());
    };

    const timer = setTimeout(() => {
      cleanup();
      reject(onTimeout());
    }, timeoutMs);

    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      value => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}
