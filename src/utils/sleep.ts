/**
 * Sleep utilities
 */

import { RequestCancelledError } from '../errors/types';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep that rejects with a RequestCancelledError as soon as the signal aborts.
 * The wait yields to the event loop; nothing spins.
 */
export function sleepWithSignal(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestCancelledError('Sleep cancelled'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeout);
      reject(new RequestCancelledError('Sleep cancelled'));
    };

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
