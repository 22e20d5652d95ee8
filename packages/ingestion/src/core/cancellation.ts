import { CancelledError } from '../types.js';

/** Largest delay setTimeout honours; longer values fire after 1 ms. */
export const MAX_SLEEP_MS = 2 ** 31 - 1;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/** setTimeout-based sleep that rejects with CancelledError once the signal aborts. */
export const sleep: Sleep = (ms, signal) => {
  if (signal?.aborted) return Promise.reject(new CancelledError());

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.min(ms, MAX_SLEEP_MS));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
