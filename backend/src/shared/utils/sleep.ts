/**
 * Abortable Timers
 *
 * Every poll wait and retry backoff goes through `sleep`, so cancellation
 * wakes the waiter immediately instead of after the full delay.
 *
 * @module shared/utils/sleep
 */

import { CancelledError } from '@/shared/errors';

/**
 * Throw `CancelledError` if the signal has already fired.
 */
export function throwIfAborted(signal?: AbortSignal, message = 'Execution cancelled'): void {
  if (signal?.aborted) {
    throw new CancelledError(message);
  }
}

/**
 * Resolve after `ms` milliseconds, or reject with `CancelledError` when the
 * signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Execution cancelled'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('Execution cancelled'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Abort controller that follows one or more parent signals.
 *
 * `dispose()` detaches the listeners once the child is no longer needed.
 */
export function createLinkedAbortController(
  ...parents: Array<AbortSignal | undefined>
): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = (): void => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener('abort', onAbort));
  }

  return {
    controller,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
    },
  };
}

/**
 * Settle with `promise`, or reject with `CancelledError` as soon as the
 * signal fires. The underlying work is not cancelled.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancelledError('Execution cancelled'));
      return;
    }

    const onAbort = (): void => reject(new CancelledError('Execution cancelled'));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
