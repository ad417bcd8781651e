/**
 * Async utilities for Curricula
 */

import { CancelledError } from "./errors.js";

/**
 * Sleep for a specified duration. Rejects with CancelledError if the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Throw CancelledError when the signal has fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, phase?: string): void {
  if (signal?.aborted) {
    throw new CancelledError(undefined, { phase });
  }
}

/**
 * Create a deferred promise
 */
export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

/**
 * Create a semaphore for limiting concurrency
 */
export function createSemaphore(maxConcurrency: number) {
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throw new RangeError(`Semaphore size must be a positive integer, got ${maxConcurrency}`);
  }

  let current = 0;
  const queue: (() => void)[] = [];

  async function acquire(): Promise<void> {
    if (current < maxConcurrency) {
      current++;
      return;
    }

    return new Promise((resolve) => {
      queue.push(resolve);
    });
  }

  function release(): void {
    const next = queue.shift();
    if (next) {
      next();
    } else {
      current--;
    }
  }

  async function withSemaphore<T>(fn: () => Promise<T>): Promise<T> {
    await acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  return {
    acquire,
    release,
    withSemaphore,
    get active(): number {
      return current;
    },
  };
}

/**
 * Run items through fn with at most `concurrency` in flight, keeping input order.
 *
 * Fail-fast: after the first rejection no further item is started, items already
 * running are awaited, and the first error is rethrown. `onError` sees every failure.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: {
    concurrency: number;
    signal?: AbortSignal;
    onError?: (error: unknown, item: T, index: number) => void;
  },
): Promise<R[]> {
  const semaphore = createSemaphore(options.concurrency);
  const results: R[] = [];
  const failures: unknown[] = [];

  const running = items.map((item, index) =>
    semaphore.withSemaphore(async () => {
      if (failures.length > 0 || options.signal?.aborted) return;
      try {
        results[index] = await fn(item, index);
      } catch (error) {
        options.onError?.(error, item, index);
        failures.push(error);
      }
    }),
  );

  await Promise.all(running);

  if (failures.length > 0) {
    throw failures[0];
  }
  throwIfAborted(options.signal);
  return results;
}
