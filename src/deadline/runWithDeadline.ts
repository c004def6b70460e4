import type { ScopeParent } from '../runtime/cancellationScope.js';
import { getDefaultTimerService } from '../runtime/timerService.js';
import type { TimerService } from '../runtime/timerService.js';
import type { Continuation, Outcome, TimeUnit } from '../types.js';
import { DEFAULT_TIME_UNIT } from '../utils/timeUnit.js';
import { BoundedTask } from './boundedTask.js';
import type { BoundedTaskOptions, DeadlineWork } from './boundedTask.js';
import { TimeoutSignal, assertValidDuration, isTimeoutSignal } from './timeoutSignal.js';

export interface DeadlineOptions {
  /** Enclosing scope or signal; its cancellation propagates into the work. */
  parent?: ScopeParent;
  /** Time source for the deadline timer. Defaults to Node.js timers. */
  timers?: TimerService;
  /** Name given to the work's cancellation scope, used in log lines. */
  name?: string;
}

class RaisingBoundedTask<T> extends BoundedTask<T, T> {
  protected afterCompletion(outcome: Outcome<T>): void {
    if (outcome.ok) {
      this.continuation.resume(outcome.value);
    } else {
      this.continuation.resumeWithError(outcome.error);
    }
  }
}

class SentinelBoundedTask<T> extends BoundedTask<T, T | null> {
  protected afterCompletion(outcome: Outcome<T>): void {
    if (outcome.ok) {
      this.continuation.resume(outcome.value);
    } else if (isTimeoutSignal(outcome.error) && outcome.error.owner === this) {
      this.continuation.resume(null);
    } else {
      this.continuation.resumeWithError(outcome.error);
    }
  }
}

function suspend<T, R>(
  create: (continuation: Continuation<R>, options: BoundedTaskOptions) => BoundedTask<T, R>,
  work: DeadlineWork<T>,
  options: DeadlineOptions
): Promise<R> {
  return new Promise<R>((resolve, reject) => {
    const task = create(
      { resume: resolve, resumeWithError: reject },
      { parent: options.parent, name: options.name }
    );
    try {
      task.arm(options.timers ?? getDefaultTimerService());
    } catch (error) {
      task.scope.complete();
      throw error;
    }
    task.start(work);
  });
}

type WorkArgs<T> = [work: DeadlineWork<T>, options?: DeadlineOptions];
type UnitWorkArgs<T> = [unit: TimeUnit, work: DeadlineWork<T>, options?: DeadlineOptions];

function hasUnit<T>(args: WorkArgs<T> | UnitWorkArgs<T>): args is UnitWorkArgs<T> {
  return typeof args[0] === 'string';
}

function resolveArgs<T>(args: WorkArgs<T> | UnitWorkArgs<T>) {
  if (hasUnit(args)) {
    const [unit, work, options = {}] = args;
    return { unit, work, options };
  }
  const [work, options = {}] = args;
  return { unit: DEFAULT_TIME_UNIT, work, options };
}

/**
 * Runs `work` with a deadline and rejects with a {@link TimeoutSignal} if the
 * deadline elapses first. The unit defaults to milliseconds when omitted.
 *
 * On timeout the work's scope is cancelled with the signal, and the work sees
 * it at its next suspension point (`scope.delay`, `scope.guard`,
 * `scope.ensureActive` or `scope.signal`). Once the deadline has fired the
 * call rejects with the TimeoutSignal even if the work catches it and returns
 * a value or throws something else.
 *
 * A zero duration rejects immediately without starting the work; a negative
 * one rejects with a `DeadlineArgumentError`.
 */
export function runWithDeadline<T>(
  duration: number,
  work: DeadlineWork<T>,
  options?: DeadlineOptions
): Promise<T>;
export function runWithDeadline<T>(
  duration: number,
  unit: TimeUnit,
  work: DeadlineWork<T>,
  options?: DeadlineOptions
): Promise<T>;
export async function runWithDeadline<T>(
  duration: number,
  ...args: WorkArgs<T> | UnitWorkArgs<T>
): Promise<T> {
  const { unit, work, options } = resolveArgs(args);
  assertValidDuration(duration);
  if (duration === 0) {
    throw new TimeoutSignal('Timed out immediately');
  }
  return suspend<T, T>(
    (continuation, taskOptions) => new RaisingBoundedTask<T>(duration, unit, continuation, taskOptions),
    work,
    options
  );
}

/**
 * Like {@link runWithDeadline}, but resolves `null` when this call's own
 * deadline elapses. Any other error, including the TimeoutSignal of an
 * enclosing deadline, is rethrown.
 */
export function runWithDeadlineOrNone<T>(
  duration: number,
  work: DeadlineWork<T>,
  options?: DeadlineOptions
): Promise<T | null>;
export function runWithDeadlineOrNone<T>(
  duration: number,
  unit: TimeUnit,
  work: DeadlineWork<T>,
  options?: DeadlineOptions
): Promise<T | null>;
export async function runWithDeadlineOrNone<T>(
  duration: number,
  ...args: WorkArgs<T> | UnitWorkArgs<T>
): Promise<T | null> {
  const { unit, work, options } = resolveArgs(args);
  assertValidDuration(duration);
  if (duration === 0) {
    return null;
  }
  return suspend<T, T | null>(
    (continuation, taskOptions) => new SentinelBoundedTask<T>(duration, unit, continuation, taskOptions),
    work,
    options
  );
}
