/**
 * Deadline helpers. A deadline is an absolute epoch-millisecond instant;
 * `undefined` means unbounded.
 *
 * @module utils/deadline
 */

import { OperationTimeout } from './errors.js';

export function deadlineIn(ms: number, now: number = Date.now()): number {
  return now + ms;
}

export function remainingMs(deadline: number | undefined, now: number = Date.now()): number | undefined {
  return deadline === undefined ? undefined : Math.max(0, deadline - now);
}

export function assertBeforeDeadline(
  deadline: number | undefined,
  operation: string,
  now: number = Date.now(),
): void {
  if (deadline !== undefined && now >= deadline) {
    throw new OperationTimeout(operation);
  }
}

/**
 * Race `promise` against the deadline. On expiry the returned promise
 * rejects with {@link OperationTimeout} and `onExpire` runs, so the caller
 * can abort the underlying work.
 */
export function withDeadline<T>(
  promise: Promise<T>,
  deadline: number | undefined,
  operation: string,
  onExpire?: () => void,
): Promise<T> {
  const ms = remainingMs(deadline);
  if (ms === undefined) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onExpire?.();
      reject(new OperationTimeout(operation));
    }, ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
