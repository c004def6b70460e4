export { runWithDeadline, runWithDeadlineOrNone } from './deadline/runWithDeadline.js';
export type { DeadlineOptions } from './deadline/runWithDeadline.js';
export { BoundedTask } from './deadline/boundedTask.js';
export type { BoundedTaskOptions, BoundedTaskState, DeadlineWork } from './deadline/boundedTask.js';
export { DeadlineArgumentError, TimeoutSignal, isTimeoutSignal } from './deadline/timeoutSignal.js';
export { CancellationError, CancellationScope } from './runtime/cancellationScope.js';
export type { CancellationScopeOptions, ScopeParent, ScopeState } from './runtime/cancellationScope.js';
export {
  MAX_TIMER_DELAY_MS,
  NodeTimerService,
  getDefaultTimerService,
} from './runtime/timerService.js';
export type { TimerHandle, TimerService, TimerState } from './runtime/timerService.js';
export { ManualTimerHandle, ManualTimerService } from './runtime/manualTimerService.js';
export { loadConfig, reloadConfig } from './config.js';
export { getLogger } from './logger.js';
export { TIME_UNITS } from './types.js';
export type { AppConfig, Continuation, Outcome, TimeUnit } from './types.js';
export { describeDuration, toMillis } from './utils/timeUnit.js';
