import { loadConfig } from '../config.js';
import { getLogger } from '../logger.js';
import type { TimeUnit } from '../types.js';
import { toMillis } from '../utils/timeUnit.js';

export type TimerState = 'pending' | 'fired' | 'disposed';

export interface TimerHandle {
  readonly state: TimerState;
  /** Cancels the pending fire. No-op once the timer fired or was disposed. */
  dispose(): void;
}

export interface TimerService {
  register(duration: number, unit: TimeUnit, onFire: () => void): TimerHandle;
}

/** Node.js clamps larger delays to 1 ms, so longer timers are re-armed in chunks. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

class NodeTimerHandle implements TimerHandle {
  #state: TimerState = 'pending';
  #timer: ReturnType<typeof setTimeout> | null = null;
  #remainingMs: number;
  readonly #onFire: () => void;
  readonly #unref: boolean;

  constructor(delayMs: number, onFire: () => void, unref: boolean) {
    this.#remainingMs = delayMs;
    this.#onFire = onFire;
    this.#unref = unref;
    if (Number.isFinite(delayMs)) {
      this.#arm();
    }
  }

  get state(): TimerState {
    return this.#state;
  }

  dispose(): void {
    if (this.#state !== 'pending') {
      return;
    }
    this.#state = 'disposed';
    if (this.#timer) {
      clearTimeout(this.#timer);
      this.#timer = null;
    }
  }

  #arm(): void {
    const chunkMs = Math.min(Math.ceil(this.#remainingMs), MAX_TIMER_DELAY_MS);
    this.#timer = setTimeout(() => this.#tick(chunkMs), chunkMs);
    if (this.#unref) {
      this.#timer.unref();
    }
  }

  #tick(elapsedMs: number): void {
    if (this.#state !== 'pending') {
      return;
    }
    this.#remainingMs -= elapsedMs;
    if (this.#remainingMs > 0) {
      getLogger().trace({ event: 'deadline_timer_rearmed', remainingMs: this.#remainingMs });
      this.#arm();
      return;
    }
    this.#state = 'fired';
    this.#timer = null;
    this.#onFire();
  }
}

export class NodeTimerService implements TimerService {
  readonly #unref: boolean;

  constructor(options: { unref?: boolean } = {}) {
    this.#unref = options.unref ?? loadConfig().timers.unref;
  }

  register(duration: number, unit: TimeUnit, onFire: () => void): TimerHandle {
    return new NodeTimerHandle(toMillis(duration, unit), onFire, this.#unref);
  }
}

let defaultService: NodeTimerService | null = null;

export function getDefaultTimerService(): TimerService {
  if (!defaultService) {
    defaultService = new NodeTimerService();
  }
  return defaultService;
}
