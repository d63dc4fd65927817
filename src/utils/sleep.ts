// src/utils/sleep.ts

import { RunCancelledError } from './errors';

/**
 * setTimeout as a promise; rejects with RunCancelledError when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunCancelledError('Cancelled while waiting'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError('Cancelled while waiting'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
