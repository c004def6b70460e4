import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ManualTimerService } from './manualTimerService.js';
import { MAX_TIMER_DELAY_MS, NodeTimerService } from './timerService.js';

describe('NodeTimerService', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires once after the duration', () => {
    const onFire = vi.fn();
    const handle = new NodeTimerService({ unref: false }).register(50, 'milliseconds', onFire);

    vi.advanceTimersByTime(49);
    expect(onFire).not.toHaveBeenCalled();
    expect(handle.state).toBe('pending');

    vi.advanceTimersByTime(1);
    expect(onFire).toHaveBeenCalledTimes(1);
    expect(handle.state).toBe('fired');

    handle.dispose();
    expect(handle.state).toBe('fired');
  });

  it('never fires a disposed timer', () => {
    const onFire = vi.fn();
    const handle = new NodeTimerService({ unref: false }).register(50, 'milliseconds', onFire);

    handle.dispose();
    handle.dispose();
    vi.advanceTimersByTime(100);

    expect(onFire).not.toHaveBeenCalled();
    expect(handle.state).toBe('disposed');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('converts the unit before scheduling', () => {
    const onFire = vi.fn();
    new NodeTimerService({ unref: false }).register(2, 'seconds', onFire);

    vi.advanceTimersByTime(1_999);
    expect(onFire).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it('rounds sub-millisecond durations up', () => {
    const onFire = vi.fn();
    new NodeTimerService({ unref: false }).register(500, 'microseconds', onFire);

    vi.advanceTimersByTime(0);
    expect(onFire).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it('re-arms durations beyond the platform timer ceiling', () => {
    const onFire = vi.fn();
    const handle = new NodeTimerService({ unref: false }).register(30, 'days', onFire);
    const totalMs = 30 * 86_400_000;

    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS);
    expect(onFire).not.toHaveBeenCalled();
    expect(handle.state).toBe('pending');

    vi.advanceTimersByTime(totalMs - MAX_TIMER_DELAY_MS - 1);
    expect(onFire).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it('does not schedule a non-finite duration', () => {
    const onFire = vi.fn();
    const handle = new NodeTimerService({ unref: false }).register(Infinity, 'milliseconds', onFire);

    expect(vi.getTimerCount()).toBe(0);
    expect(handle.state).toBe('pending');
    handle.dispose();
    expect(handle.state).toBe('disposed');
  });
});

describe('ManualTimerService', () => {
  it('fires due timers in deadline order when advanced', () => {
    const timers = new ManualTimerService();
    const order: string[] = [];
    timers.register(30, 'milliseconds', () => order.push('late'));
    timers.register(10, 'milliseconds', () => order.push('early'));
    timers.register(1, 'seconds', () => order.push('never'));

    timers.advanceBy(30);

    expect(order).toEqual(['early', 'late']);
    expect(timers.now).toBe(30);
    expect(timers.fires).toBe(2);
    expect(timers.pending).toHaveLength(1);
  });

  it('skips disposed timers but counts every dispose call', () => {
    const timers = new ManualTimerService();
    const onFire = vi.fn();
    const handle = timers.register(10, 'milliseconds', onFire);

    handle.dispose();
    handle.dispose();
    timers.advanceBy(10);

    expect(onFire).not.toHaveBeenCalled();
    expect(timers.disposals).toBe(2);
    expect(handle.state).toBe('disposed');
  });

  it('invokes the callback on a direct fire regardless of state', () => {
    const timers = new ManualTimerService();
    const onFire = vi.fn();
    const handle = timers.register(10, 'milliseconds', onFire);

    timers.fire(handle);
    timers.fire(handle);

    expect(onFire).toHaveBeenCalledTimes(2);
    expect(timers.fires).toBe(2);
    expect(handle.state).toBe('fired');
  });
});
