import loggerModule from '../logger.js';
import { SlidingWindow } from './window.js';

type AggregatorLogger = Pick<typeof loggerModule, 'info' | 'warn' | 'debug'>;

export interface SlaAggregatorOptions {
  windowSize: number;
  logger?: AggregatorLogger;
}

export type AggregatorState = {
  previousSuccess: number | null;
  previousFail: number | null;
  window: number[];
  windowCapacity: number;
};

/**
 * Events accumulated by a monotonic counter since the previous snapshot. A
 * value below the previous one means the upstream counter restarted from zero,
 * so the whole current value counts as new events.
 */
export function calculateCounterDelta(current: number, previous: number | null): number {
  let delta = previous === null ? current : current - previous;
  if (delta < 0) {
    delta = current;
  }
  return delta < 0 ? 0 : delta;
}

function clampRatio(value: number): number {
  if (value < 0) {
    return 0;
  }
  if (value > 1) {
    return 1;
  }
  return value;
}

export class SlaAggregator {
  private readonly logger: AggregatorLogger;
  private readonly window: SlidingWindow;
  private previousSuccess: number | null = null;
  private previousFail: number | null = null;

  constructor(options: SlaAggregatorOptions) {
    this.window = new SlidingWindow(options.windowSize);
    this.logger = options.logger ?? loggerModule;
  }

  /**
   * Success ratio of the events observed since the previous call, or `null`
   * when nothing can be recorded for this interval (both counters missing, or
   * no new events).
   */
  computeInterval(successTotal: number | null, failTotal: number | null): number | null {
    if (successTotal === null && failTotal === null) {
      this.logger.warn('Both success and fail totals are missing; skipping SLA computation for this interval');
      return null;
    }

    const success = successTotal ?? 0;
    const fail = failTotal ?? 0;

    const deltaSuccess = calculateCounterDelta(success, this.previousSuccess);
    const deltaFail = calculateCounterDelta(fail, this.previousFail);

    if (this.previousSuccess !== null && success < this.previousSuccess) {
      this.logger.info(
        { counter: 'success', previous: this.previousSuccess, current: success },
        'Counter reset detected'
      );
    }
    if (this.previousFail !== null && fail < this.previousFail) {
      this.logger.info({ counter: 'fail', previous: this.previousFail, current: fail }, 'Counter reset detected');
    }

    this.previousSuccess = success;
    this.previousFail = fail;

    const deltaTotal = deltaSuccess + deltaFail;
    if (deltaTotal <= 0) {
      this.logger.info('No prober events in this interval; SLA window unchanged');
      return null;
    }

    const ratio = deltaSuccess / deltaTotal;
    if (!Number.isFinite(ratio)) {
      this.logger.warn({ deltaSuccess, deltaFail }, 'Interval ratio is not finite; SLA window unchanged');
      return null;
    }

    return clampRatio(ratio);
  }

  addToWindow(ratio: number) {
    if (!Number.isFinite(ratio) || ratio < 0 || ratio > 1) {
      throw new RangeError(`SLA ratio must be within [0, 1] (got ${ratio})`);
    }
    this.window.push(ratio);
  }

  windowAverage(): number | null {
    return this.window.average();
  }

  get windowSize(): number {
    return this.window.size;
  }

  getState(): AggregatorState {
    return {
      previousSuccess: this.previousSuccess,
      previousFail: this.previousFail,
      window: this.window.values(),
      windowCapacity: this.window.capacity
    };
  }
}
