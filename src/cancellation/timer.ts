/**
 * Longest delay a single Node.js timer honours. Larger delays fire after 1 ms.
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type CancelTimer = () => void;

/**
 * `setTimeout` without the timer limit. Longer delays run as a chain of
 * timers, each at most MAX_TIMER_DELAY_MS.
 */
export function scheduleTimeout(callback: () => void, ms: number): CancelTimer {
  let handle: ReturnType<typeof setTimeout>;

  const arm = (remaining: number): void => {
    if (remaining > MAX_TIMER_DELAY_MS) {
      handle = setTimeout(() => arm(remaining - MAX_TIMER_DELAY_MS), MAX_TIMER_DELAY_MS);
    } else {
      handle = setTimeout(callback, remaining);
    }
  };
  arm(ms);

  return () => clearTimeout(handle);
}
