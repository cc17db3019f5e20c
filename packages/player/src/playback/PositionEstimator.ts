/**
 * PositionEstimator - coarse playback offset between ticks
 *
 * Adds the tick interval to the estimate on every tick. It is an
 * approximation driven by a timer, never a read of the real position.
 * Ticks run on the event loop, the same thread that mutates the estimate
 * from player operations.
 */

import type { IntervalScheduler } from '../types/player';
import { validate } from '../utils/validation';
import { PositionEstimatorOptionsSchema } from '../utils/validators';
import { PlayerLogger } from '../utils/logger';

const logger = PlayerLogger.child('PositionEstimator');

export interface PositionEstimatorOptions {
  /** Tick interval in seconds */
  interval: number;
  scheduler?: IntervalScheduler;
  /** Called with the new estimate after every change */
  onChange?: (estimate: number) => void;
}

/**
 * Scheduler backed by the global setInterval/clearInterval
 */
export const timerScheduler: IntervalScheduler = {
  schedule(callback, ms) {
    const timer = setInterval(callback, ms);
    return () => clearInterval(timer);
  },
};

export class PositionEstimator {
  private readonly interval: number;
  private readonly scheduler: IntervalScheduler;
  private readonly onChange?: (estimate: number) => void;
  private estimate = 0;
  private cancelTick: (() => void) | null = null;

  constructor(options: PositionEstimatorOptions) {
    validate(PositionEstimatorOptionsSchema, options, 'PositionEstimatorOptions');
    this.interval = options.interval;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.onChange = options.onChange;
  }

  /**
   * Begin ticking; a running tick is replaced, never doubled
   */
  start(): void {
    this.cancel();
    this.cancelTick = this.scheduler.schedule(() => {
      this.update(this.estimate + this.interval);
    }, this.interval * 1000);

    logger.debug('Started', { interval: this.interval, estimate: this.estimate });
  }

  /**
   * Stop ticking. No-op when not running.
   */
  cancel(): void {
    if (!this.cancelTick) return;

    this.cancelTick();
    this.cancelTick = null;

    logger.debug('Cancelled', { estimate: this.estimate });
  }

  update(position: number): void {
    this.estimate = Math.max(0, position);
    this.onChange?.(this.estimate);
  }

  reset(): void {
    this.update(0);
  }

  getEstimate(): number {
    return this.estimate;
  }

  getInterval(): number {
    return this.interval;
  }

  isRunning(): boolean {
    return this.cancelTick !== null;
  }
}
