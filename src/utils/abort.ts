/**
 * Cancellation helpers built on AbortSignal
 */

import { RequestCancelledError } from '../errors/types';

export interface LinkedSignal {
  signal: AbortSignal;
  /** Detach listeners and clear the timeout */
  dispose(): void;
}

/**
 * A signal that aborts when any parent aborts, or after `timeoutMs`.
 * The reason of the first abort is carried over.
 */
export function linkSignals(parents: ReadonlyArray<AbortSignal | undefined>, timeoutMs?: number): LinkedSignal {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];
  let timer: NodeJS.Timeout | undefined;

  const dispose = (): void => {
    if (timer) {
      clearTimeout(timer);
    }
    detachers.forEach((detach) => detach());
    detachers.length = 0;
  };

  for (const parent of parents) {
    if (!parent) {
      continue;
    }
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = (): void => {
      controller.abort(parent.reason);
      dispose();
    };
    parent.addEventListener('abort', onAbort, { once: true });
    detachers.push(() => parent.removeEventListener('abort', onAbort));
  }

  if (timeoutMs !== undefined && !controller.signal.aborted) {
    timer = setTimeout(() => {
      controller.abort(new TimeoutSignalReason(timeoutMs));
      dispose();
    }, timeoutMs);
  }

  return { signal: controller.signal, dispose };
}

/**
 * Abort reason set by linkSignals when its own timeout fires
 */
export class TimeoutSignalReason extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutSignalReason';
  }
}

/**
 * Settle with `promise`, or reject with RequestCancelledError as soon as
 * `signal` aborts, whichever comes first. A collaborator that ignores the
 * signal cannot hold the caller past cancellation.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new RequestCancelledError());
    };

    // Settling after the abort is a no-op on this promise, but the handlers
    // stay attached so a late rejection is never reported as unhandled
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

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
