import { describe, expect, it } from 'vitest';
import { CancellationError } from '../runtime/cancellationScope.js';
import { DeadlineArgumentError, TimeoutSignal, assertValidDuration, isTimeoutSignal } from './timeoutSignal.js';

describe('TimeoutSignal', () => {
  it('is a cancellation carrying its owner by reference', () => {
    const owner = {};
    const signal = new TimeoutSignal('Timed out waiting for 5 seconds', owner);

    expect(signal).toBeInstanceOf(CancellationError);
    expect(signal.owner).toBe(owner);
    expect(signal.code).toBe('DEADLINE_TIMEOUT');
    expect(signal.name).toBe('TimeoutSignal');
  });

  it('treats equal-looking owners as different', () => {
    const a = new TimeoutSignal('Timed out waiting for 5 seconds', { duration: 5 });
    const b = new TimeoutSignal('Timed out waiting for 5 seconds', { duration: 5 });
    expect(a.owner === b.owner).toBe(false);
  });

  it('narrows unknown errors', () => {
    expect(isTimeoutSignal(new TimeoutSignal('Timed out immediately'))).toBe(true);
    expect(isTimeoutSignal(new CancellationError())).toBe(false);
    expect(isTimeoutSignal('timeout')).toBe(false);
  });
});

describe('assertValidDuration', () => {
  it('accepts zero and positive durations', () => {
    expect(() => assertValidDuration(0)).not.toThrow();
    expect(() => assertValidDuration(1.5)).not.toThrow();
  });

  it('rejects negative durations with an argument error', () => {
    expect(() => assertValidDuration(-1)).toThrow(DeadlineArgumentError);
    expect(() => assertValidDuration(-1)).toThrow('Timeout time -1 cannot be negative');
  });
});
