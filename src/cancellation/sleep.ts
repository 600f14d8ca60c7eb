import { cancellationReason } from './scope.js';
import { scheduleTimeout } from './timer.js';

/**
 * Wait for `ms` milliseconds, or reject with the cancellation error as soon
 * as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    return new Promise((resolve) => {
      scheduleTimeout(() => resolve(), ms);
    });
  }

  const abortSignal = signal;
  return new Promise((resolve, reject) => {
    if (abortSignal.aborted) {
      reject(cancellationReason(abortSignal));
      return;
    }

    const onAbort = (): void => {
      cancelTimer();
      reject(cancellationReason(abortSignal));
    };
    const cancelTimer = scheduleTimeout(() => {
      abortSignal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    abortSignal.addEventListener('abort', onAbort, { once: true });
  });
}
