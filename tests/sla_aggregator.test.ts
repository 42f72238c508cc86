import { describe, expect, it } from 'vitest';
import { SlaAggregator, calculateCounterDelta } from '../src/sla/aggregator.js';
import { createLoggerStub } from './helpers/logger.js';

function createAggregator(windowSize = 3) {
  const logger = createLoggerStub();
  const aggregator = new SlaAggregator({ windowSize, logger });
  return { aggregator, logger };
}

describe('CounterDelta', () => {
  it('uses the whole value on the first observation', () => {
    expect(calculateCounterDelta(10, null)).toBe(10);
  });

  it('subtracts the previous total', () => {
    expect(calculateCounterDelta(15, 10)).toBe(5);
  });

  it('treats a decrease as a counter restart', () => {
    expect(calculateCounterDelta(5, 100)).toBe(5);
  });

  it('never goes negative', () => {
    expect(calculateCounterDelta(0, 3)).toBe(0);
  });
});

describe('SlaAggregator', () => {
  it('computes interval ratios and their window average', () => {
    const { aggregator } = createAggregator(12);

    expect(aggregator.computeInterval(10, 0)).toBe(1);
    aggregator.addToWindow(1);
    expect(aggregator.windowAverage()).toBe(1);

    expect(aggregator.computeInterval(15, 5)).toBe(0.5);
    aggregator.addToWindow(0.5);
    expect(aggregator.windowAverage()).toBe(0.75);

    expect(aggregator.getState()).toEqual({
      previousSuccess: 15,
      previousFail: 5,
      window: [1, 0.5],
      windowCapacity: 12
    });
  });

  it('computes the ratio of deltas between snapshots', () => {
    const { aggregator } = createAggregator();
    aggregator.computeInterval(3, 1);

    expect(aggregator.computeInterval(7, 4)).toBe(4 / 7);
  });

  it('counts the new value after a counter reset', () => {
    const { aggregator, logger } = createAggregator();
    aggregator.computeInterval(100, 0);

    expect(aggregator.computeInterval(5, 0)).toBe(1);
    expect(logger.info).toHaveBeenCalledWith(
      { counter: 'success', previous: 100, current: 5 },
      'Counter reset detected'
    );
    expect(aggregator.getState().previousSuccess).toBe(5);
  });

  it('yields no ratio when no events happened', () => {
    const { aggregator, logger } = createAggregator();
    expect(aggregator.computeInterval(10, 2)).toBe(10 / 12);

    expect(aggregator.computeInterval(10, 2)).toBeNull();
    expect(logger.info).toHaveBeenCalledWith('No prober events in this interval; SLA window unchanged');
    expect(aggregator.getState().window).toEqual([]);
  });

  it('leaves previous totals untouched when both counters are missing', () => {
    const { aggregator, logger } = createAggregator();
    aggregator.computeInterval(10, 2);

    expect(aggregator.computeInterval(null, null)).toBeNull();
    expect(aggregator.computeInterval(null, null)).toBeNull();

    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(aggregator.getState()).toMatchObject({ previousSuccess: 10, previousFail: 2 });
    expect(aggregator.computeInterval(13, 3)).toBe(0.75);
  });

  it('reads a single missing counter as zero', () => {
    const { aggregator } = createAggregator();
    aggregator.computeInterval(10, 2);

    expect(aggregator.computeInterval(null, 4)).toBe(0);
    expect(aggregator.getState()).toMatchObject({ previousSuccess: 0, previousFail: 4 });
  });

  it('yields no ratio when a counter is not finite', () => {
    const { aggregator, logger } = createAggregator();
    aggregator.computeInterval(10, 0);

    expect(aggregator.computeInterval(Number.POSITIVE_INFINITY, 5)).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      { deltaSuccess: Number.POSITIVE_INFINITY, deltaFail: 5 },
      'Interval ratio is not finite; SLA window unchanged'
    );
    expect(aggregator.getState().window).toEqual([]);
  });

  it('rejects window entries outside the unit interval', () => {
    const { aggregator } = createAggregator();

    expect(() => aggregator.addToWindow(1.2)).toThrow('SLA ratio must be within [0, 1] (got 1.2)');
    expect(() => aggregator.addToWindow(Number.NaN)).toThrow(RangeError);
    expect(aggregator.windowSize).toBe(0);
  });

  it('keeps only the most recent intervals', () => {
    const { aggregator } = createAggregator(3);
    for (const ratio of [1, 0.5, 0, 1]) {
      aggregator.addToWindow(ratio);
    }

    expect(aggregator.getState().window).toEqual([0.5, 0, 1]);
    expect(aggregator.windowAverage()).toBe(0.5);
    expect(aggregator.windowSize).toBe(3);
  });
});
