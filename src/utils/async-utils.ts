/**
 * Abort-aware async helpers: sleeping, time bounds, and bounded fan-out.
 */

import { CancelledError } from './errors.js';

/**
 * Throw CancelledError if the signal has already fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError('Operation cancelled', signal.reason);
  }
}

/**
 * Sleep for a duration. Rejects with CancelledError when the signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('Operation cancelled', signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface TimeoutOptions {
  /** Caller's signal; aborting it rejects with CancelledError. */
  signal?: AbortSignal;
  /** Builds the error raised when the time bound is hit. */
  onTimeout: () => Error;
}

/**
 * Run `fn` with a hard time bound.
 *
 * `fn` receives a signal that fires on timeout or caller cancellation, so
 * in-flight I/O is torn down rather than orphaned. The returned promise settles
 * as soon as either fires, even if `fn` ignores its signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: TimeoutOptions,
): Promise<T> {
  throwIfAborted(options.signal);

  const controller = new AbortController();
  const guard = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true,
    });
  });
  const abortFromCaller = (): void => {
    controller.abort(new CancelledError('Operation cancelled', options.signal?.reason));
  };
  options.signal?.addEventListener('abort', abortFromCaller, { once: true });
  const timer = setTimeout(() => controller.abort(options.onTimeout()), timeoutMs);

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', abortFromCaller);
  }
}

/**
 * Map over items with at most `concurrency` calls in flight.
 *
 * Fails fast: the first rejection aborts the signal handed to every other
 * in-flight call, no new calls start, and that first error is rethrown.
 * Results keep input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  throwIfAborted(signal);

  const controller = new AbortController();
  const forward = (): void => controller.abort(signal?.reason);
  signal?.addEventListener('abort', forward, { once: true });

  const results: R[] = new Array<R>(items.length);
  let next = 0;
  let failed = false;
  let firstError: unknown;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index, controller.signal);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
          controller.abort(error);
        }
      }
    }
  };

  try {
    const workerCount = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  } finally {
    signal?.removeEventListener('abort', forward);
  }

  if (failed) {
    throw firstError;
  }
  return results;
}
