import { describe, it, expect, vi, afterEach } from 'vitest';
import { PositionEstimator, timerScheduler } from '../PositionEstimator';
import type { IntervalScheduler } from '../../types';
import { ValidationError } from '../../types';

/**
 * Scheduler that only ticks when told to
 */
function createManualScheduler() {
  const callbacks = new Set<() => void>();
  const cancel = vi.fn();
  const scheduler: IntervalScheduler = {
    schedule: vi.fn((callback: () => void) => {
      callbacks.add(callback);
      return () => {
        cancel();
        callbacks.delete(callback);
      };
    }),
  };
  return {
    scheduler,
    cancel,
    tick: () => callbacks.forEach((callback) => callback()),
    active: () => callbacks.size,
  };
}

describe('PositionEstimator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should add the interval on every tick', () => {
    const manual = createManualScheduler();
    const onChange = vi.fn();
    const estimator = new PositionEstimator({ interval: 0.5, scheduler: manual.scheduler, onChange });

    estimator.start();
    manual.tick();
    manual.tick();

    expect(manual.scheduler.schedule).toHaveBeenCalledWith(expect.any(Function), 500);
    expect(estimator.getEstimate()).toBe(1);
    expect(onChange).toHaveBeenLastCalledWith(1);
  });

  it('should replace a running tick on start', () => {
    const manual = createManualScheduler();
    const estimator = new PositionEstimator({ interval: 1, scheduler: manual.scheduler });

    estimator.start();
    estimator.start();
    manual.tick();

    expect(manual.active()).toBe(1);
    expect(estimator.getEstimate()).toBe(1);
  });

  it('should cancel once and ignore further cancels', () => {
    const manual = createManualScheduler();
    const estimator = new PositionEstimator({ interval: 1, scheduler: manual.scheduler });

    estimator.start();
    estimator.cancel();
    estimator.cancel();

    expect(manual.cancel).toHaveBeenCalledTimes(1);
    expect(estimator.isRunning()).toBe(false);
  });

  it('should keep the estimate non-negative', () => {
    const estimator = new PositionEstimator({ interval: 1 });

    estimator.update(-3);
    expect(estimator.getEstimate()).toBe(0);
    estimator.update(42);
    estimator.reset();
    expect(estimator.getEstimate()).toBe(0);
  });

  it('should reject a non-positive interval', () => {
    expect(() => new PositionEstimator({ interval: 0 })).toThrow(ValidationError);
  });

  it('should tick on real intervals by default', () => {
    vi.useFakeTimers();
    const estimator = new PositionEstimator({ interval: 1, scheduler: timerScheduler });

    estimator.start();
    vi.advanceTimersByTime(3000);
    estimator.cancel();
    vi.advanceTimersByTime(3000);

    expect(estimator.getEstimate()).toBe(3);
    expect(estimator.getInterval()).toBe(1);
  });
});
