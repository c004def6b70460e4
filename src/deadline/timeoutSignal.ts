import { CancellationError } from '../runtime/cancellationScope.js';

/**
 * Raised when a deadline elapses before its work completes.
 *
 * `owner` identifies the deadline invocation that raised the signal. It is
 * compared by reference only: two signals for the same duration and unit from
 * different invocations are never the same owner. The zero-duration path has
 * no task to point at and leaves it `null`.
 */
export class TimeoutSignal extends CancellationError {
  readonly owner: object | null;

  constructor(message: string, owner: object | null = null) {
    super(message, 'DEADLINE_TIMEOUT');
    this.name = 'TimeoutSignal';
    this.owner = owner;
  }
}

export function isTimeoutSignal(error: unknown): error is TimeoutSignal {
  return error instanceof TimeoutSignal;
}

export class DeadlineArgumentError extends RangeError {
  code: 'DEADLINE_INVALID_DURATION';

  constructor(message: string) {
    super(message);
    this.name = 'DeadlineArgumentError';
    this.code = 'DEADLINE_INVALID_DURATION';
  }
}

export function assertValidDuration(duration: number): void {
  if (Number.isNaN(duration)) {
    throw new DeadlineArgumentError(`Timeout time ${duration} is not a number`);
  }
  if (duration < 0) {
    throw new DeadlineArgumentError(`Timeout time ${duration} cannot be negative`);
  }
}
