import { toError } from '../types/Decision.js';

export class TimeoutError extends Error {
  constructor(ms: number) {
    super(`Timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export interface LinkedSignal {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * A signal that aborts when the parent aborts or after `timeoutMs`
 * (0 disables the timeout). Call dispose once the guarded work settles.
 */
export function linkSignals(parent: AbortSignal | undefined, timeoutMs: number): LinkedSignal {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      const onAbort = () => controller.abort(parent.reason);
      parent.addEventListener('abort', onAbort, { once: true });
      cleanups.push(() => parent.removeEventListener('abort', onAbort));
    }
  }

  if (timeoutMs > 0 && !controller.signal.aborted) {
    const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    dispose: () => cleanups.forEach(fn => fn())
  };
}

export function abortReason(signal: AbortSignal): Error {
  return signal.reason === undefined ? new Error('Aborted') : toError(signal.reason);
}

/**
 * Settles with `work` or rejects as soon as the signal aborts, whichever comes
 * first. Work that ignores its signal is left running but no longer awaited.
 */
export function raceAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) {
    // Keep a late rejection from surfacing as unhandled.
    work.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
