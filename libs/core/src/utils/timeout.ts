/**
 * Promise timeout guard for gateway calls
 */

import { NetworkError } from '../errors';

/**
 * Race `promise` against a timer. On expiry the returned promise rejects
 * with a NetworkError flagged `timedOut`; the wrapped promise is left to
 * settle on its own.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new NetworkError(`${label} timed out after ${timeoutMs}ms`, { timedOut: true }));
    }, timeoutMs);

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
