import type { TimeUnit } from '../types.js';
import { toMillis } from '../utils/timeUnit.js';
import type { TimerHandle, TimerService, TimerState } from './timerService.js';

export class ManualTimerHandle implements TimerHandle {
  #state: TimerState = 'pending';
  readonly dueAt: number;
  readonly onFire: () => void;
  readonly #service: ManualTimerService;

  constructor(service: ManualTimerService, dueAt: number, onFire: () => void) {
    this.#service = service;
    this.dueAt = dueAt;
    this.onFire = onFire;
  }

  get state(): TimerState {
    return this.#state;
  }

  dispose(): void {
    this.#service.disposals += 1;
    if (this.#state === 'pending') {
      this.#state = 'disposed';
    }
  }

  markFired(): void {
    if (this.#state === 'pending') {
      this.#state = 'fired';
    }
  }
}

/**
 * In-process time source whose timers only fire when the test advances time.
 * `disposals` counts every `dispose()` call, including redundant ones.
 */
export class ManualTimerService implements TimerService {
  registrations = 0;
  disposals = 0;
  fires = 0;
  #now = 0;
  #handles: ManualTimerHandle[] = [];

  get now(): number {
    return this.#now;
  }

  get pending(): ManualTimerHandle[] {
    return this.#handles.filter((handle) => handle.state === 'pending');
  }

  register(duration: number, unit: TimeUnit, onFire: () => void): ManualTimerHandle {
    this.registrations += 1;
    const handle = new ManualTimerHandle(this, this.#now + toMillis(duration, unit), onFire);
    this.#handles.push(handle);
    return handle;
  }

  advanceBy(ms: number): void {
    this.#now += ms;
    const due = this.pending
      .filter((handle) => handle.dueAt <= this.#now)
      .sort((a, b) => a.dueAt - b.dueAt);
    for (const handle of due) {
      if (handle.state === 'pending') {
        this.fire(handle);
      }
    }
  }

  /** Invokes the callback regardless of the handle's state, as a late or duplicate fire would. */
  fire(handle: ManualTimerHandle): void {
    this.fires += 1;
    handle.markFired();
    handle.onFire();
  }
}
