export {
  CancellationScope,
  cancellationReason,
  toCancellationReason,
} from './scope.js';
export type { CancellationReason, CancellationScopeOptions } from './scope.js';
export { sleep } from './sleep.js';
export { MAX_TIMER_DELAY_MS, scheduleTimeout } from './timer.js';
export type { CancelTimer } from './timer.js';
