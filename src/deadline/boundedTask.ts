import { getLogger } from '../logger.js';
import { CancellationScope } from '../runtime/cancellationScope.js';
import type { ScopeParent } from '../runtime/cancellationScope.js';
import type { TimerHandle, TimerService } from '../runtime/timerService.js';
import type { Continuation, Outcome, TimeUnit } from '../types.js';
import { describeDuration } from '../utils/timeUnit.js';
import { TimeoutSignal } from './timeoutSignal.js';

export type DeadlineWork<T> = (scope: CancellationScope) => T | PromiseLike<T>;

export type BoundedTaskState<T> =
  | { kind: 'active' }
  | { kind: 'cancellingFromTimeout'; signal: TimeoutSignal }
  | { kind: 'completedNormally'; value: T }
  | { kind: 'completedWithError'; error: unknown };

export interface BoundedTaskOptions {
  parent?: ScopeParent;
  name?: string;
}

function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Cancellation scope around deadline-bound work that is also the fire target
 * of its own timer. Whichever of the timer and the work finishes first, the
 * timer handle is disposed once and exactly one outcome reaches the caller
 * through `afterCompletion`.
 */
export abstract class BoundedTask<T, R> {
  readonly duration: number;
  readonly unit: TimeUnit;
  readonly scope: CancellationScope;
  protected readonly continuation: Continuation<R>;
  #state: BoundedTaskState<T> = { kind: 'active' };
  #timer: TimerHandle | null = null;

  constructor(
    duration: number,
    unit: TimeUnit,
    continuation: Continuation<R>,
    options: BoundedTaskOptions = {}
  ) {
    this.duration = duration;
    this.unit = unit;
    this.continuation = continuation;
    this.scope = new CancellationScope({ parent: options.parent, name: options.name ?? 'deadline' });
  }

  get state(): BoundedTaskState<T> {
    return this.#state;
  }

  get isCompleted(): boolean {
    return this.#state.kind === 'completedNormally' || this.#state.kind === 'completedWithError';
  }

  arm(timers: TimerService): void {
    if (this.isCompleted || this.#timer) {
      return;
    }
    this.#timer = timers.register(this.duration, this.unit, () => this.onFire());
    getLogger().debug({ event: 'deadline_armed', task: this.toString(), scope: this.scope.name });
  }

  /** Runs `work` inline under this task's scope, without a scheduling round-trip. */
  start(work: DeadlineWork<T>): void {
    let result: T | PromiseLike<T>;
    try {
      result = work(this.scope);
    } catch (error) {
      this.onWorkFinished({ ok: false, error });
      return;
    }
    if (isPromiseLike(result)) {
      void Promise.resolve(result).then(
        (value) => this.onWorkFinished({ ok: true, value }),
        (error: unknown) => this.onWorkFinished({ ok: false, error })
      );
      return;
    }
    this.onWorkFinished({ ok: true, value: result });
  }

  onFire(): void {
    if (this.#state.kind !== 'active' || !this.scope.isActive) {
      return;
    }
    const signal = new TimeoutSignal(
      `Timed out waiting for ${describeDuration(this.duration, this.unit)}`,
      this
    );
    this.#state = { kind: 'cancellingFromTimeout', signal };
    getLogger().debug({ event: 'deadline_fired', task: this.toString(), scope: this.scope.name });
    this.scope.cancel(signal);
  }

  /**
   * Completion gate. The first call disposes the timer and delivers the
   * outcome; later calls do nothing. A cancelled scope overrides whatever the
   * work produced, so a deadline that fired always wins over work that
   * swallowed its TimeoutSignal.
   */
  onWorkFinished(outcome: Outcome<T>): void {
    if (this.isCompleted) {
      return;
    }
    const final: Outcome<T> =
      this.scope.state === 'cancelling' ? { ok: false, error: this.scope.cause } : outcome;
    this.#state = final.ok
      ? { kind: 'completedNormally', value: final.value }
      : { kind: 'completedWithError', error: final.error };

    this.#timer?.dispose();
    this.#timer = null;
    this.scope.complete();

    getLogger().debug({
      event: 'deadline_completed',
      task: this.toString(),
      scope: this.scope.name,
      ok: final.ok,
    });
    this.afterCompletion(final);
  }

  protected abstract afterCompletion(outcome: Outcome<T>): void;

  toString(): string {
    return `BoundedTask(${describeDuration(this.duration, this.unit)})`;
  }
}
