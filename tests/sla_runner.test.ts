import { describe, expect, it } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import { SlaAggregator } from '../src/sla/aggregator.js';
import type { MetricSource, ProberMetricsSample } from '../src/sla/fetcher.js';
import { SLA_METRICS, SlaMetricsPublisher } from '../src/sla/metrics.js';
import { createSlaTask, runSlaCycle } from '../src/sla/runner.js';
import type { SlaConfig } from '../src/config/index.js';
import { createFetchStub, exposition } from './helpers/fetch.js';
import { createLoggerStub } from './helpers/logger.js';

function scriptedSource(...samples: Array<Partial<ProberMetricsSample>>): MetricSource {
  return {
    fetch: async () => ({
      success: null,
      fail: null,
      durationSeconds: 0.25,
      outcome: 'ok',
      status: 200,
      ...samples.shift()
    })
  };
}

function createCycle(source: MetricSource, windowSize = 12) {
  const registry = new MetricsRegistry();
  const logger = createLoggerStub();
  const deps = {
    source,
    aggregator: new SlaAggregator({ windowSize, logger }),
    publisher: new SlaMetricsPublisher(registry),
    logger
  };
  return { registry, deps };
}

const SLA_CONFIG: SlaConfig = {
  proberMetricsUrl: 'http://prober.test:9081/metrics',
  scrapeIntervalSeconds: 30,
  windowSize: 12,
  requestTimeoutSeconds: 1,
  successMetric: 'prober_create_user_scenario_success_total',
  failMetric: 'prober_create_user_scenario_success_fail_total'
};

describe('SlaCycle', () => {
  it('publishes interval and window ratios across cycles', async () => {
    const { registry, deps } = createCycle(
      scriptedSource({ success: 10, fail: 0 }, { success: 15, fail: 5, durationSeconds: 0.5 })
    );

    const first = await runSlaCycle(deps);
    expect(first).toMatchObject({ intervalRatio: 1, windowRatio: 1, windowSize: 1, fetchOutcome: 'ok' });

    const second = await runSlaCycle(deps);
    expect(second).toMatchObject({ intervalRatio: 0.5, windowRatio: 0.75, windowSize: 2 });

    expect(registry.getValue(SLA_METRICS.currentRatio.name)).toBe(0.5);
    expect(registry.getValue(SLA_METRICS.windowRatio.name)).toBe(0.75);
    expect(registry.getValue(SLA_METRICS.calculations.name)).toBe(2);
    expect(registry.getValue(SLA_METRICS.requestDuration.name)).toBe(0.5);

    const lines = registry.exportForPrometheus({ includeLogLevels: false }).split('\n');
    expect(lines).toContain('sla_current_ratio 0.5');
    expect(lines).toContain('sla_window_ratio 0.75');
    expect(lines).toContain('sla_calculation_total 2');
  });

  it('publishes zero placeholders when the prober times out', async () => {
    const { registry, deps } = createCycle(
      scriptedSource({ outcome: 'timeout', status: null, durationSeconds: 5 })
    );

    const result = await runSlaCycle(deps);

    expect(result).toMatchObject({
      success: null,
      fail: null,
      fetchOutcome: 'timeout',
      intervalRatio: null,
      windowRatio: null,
      windowSize: 0,
      requestDurationSeconds: 5
    });
    expect(registry.getValue(SLA_METRICS.currentRatio.name)).toBe(0);
    expect(registry.getValue(SLA_METRICS.windowRatio.name)).toBe(0);
    expect(registry.getValue(SLA_METRICS.calculations.name)).toBe(1);
    expect(registry.getValue(SLA_METRICS.requestDuration.name)).toBe(5);
  });

  it('keeps the window gauge while the prober is idle', async () => {
    const { registry, deps } = createCycle(scriptedSource({ success: 10, fail: 2 }, { success: 10, fail: 2 }));

    await runSlaCycle(deps);
    const idle = await runSlaCycle(deps);

    expect(idle.intervalRatio).toBeNull();
    expect(idle.windowRatio).toBe(10 / 12);
    expect(registry.getValue(SLA_METRICS.currentRatio.name)).toBe(0);
    expect(registry.getValue(SLA_METRICS.windowRatio.name)).toBe(10 / 12);
    expect(deps.aggregator.getState().window).toEqual([10 / 12]);
  });

  it('publishes zero and keeps the window when a counter is not finite', async () => {
    const { registry, deps } = createCycle(
      scriptedSource({ success: 10, fail: 0 }, { success: Number.POSITIVE_INFINITY, fail: 5 })
    );

    await runSlaCycle(deps);
    const result = await runSlaCycle(deps);

    expect(result).toMatchObject({ intervalRatio: null, windowRatio: 1, windowSize: 1 });
    expect(registry.getValue(SLA_METRICS.currentRatio.name)).toBe(0);
    expect(registry.getValue(SLA_METRICS.windowRatio.name)).toBe(1);
    expect(registry.getValue(SLA_METRICS.calculations.name)).toBe(2);
    expect(deps.aggregator.getState().window).toEqual([1]);
  });

  it('carries the window over a failed scrape', async () => {
    const { registry, deps } = createCycle(
      scriptedSource({ success: 10, fail: 0 }, { outcome: 'http-error', status: 500 }, { success: 12, fail: 2 })
    );

    await runSlaCycle(deps);
    const failed = await runSlaCycle(deps);
    expect(failed.windowRatio).toBe(1);
    expect(registry.getValue(SLA_METRICS.currentRatio.name)).toBe(0);

    const recovered = await runSlaCycle(deps);
    expect(recovered.intervalRatio).toBe(0.5);
    expect(recovered.windowRatio).toBe(0.75);
  });
});

describe('SlaTask', () => {
  it('scrapes the configured endpoint on each run', async () => {
    const registry = new MetricsRegistry();
    const stub = createFetchStub(
      { body: exposition({ success: 10, fail: 0 }) },
      { body: exposition({ success: 15, fail: 5 }) }
    );
    const results: Array<number | null> = [];
    const { task, aggregator } = createSlaTask({
      sla: SLA_CONFIG,
      registry,
      fetchImplementation: stub.fetch,
      onCycle: result => {
        results.push(result.intervalRatio);
      },
      logger: createLoggerStub()
    });

    await task.runOnce();
    await task.runOnce();

    expect(stub.calls.map(call => call.url)).toEqual([SLA_CONFIG.proberMetricsUrl, SLA_CONFIG.proberMetricsUrl]);
    expect(results).toEqual([1, 0.5]);
    expect(aggregator.getState().window).toEqual([1, 0.5]);
    expect(registry.getValue(SLA_METRICS.windowRatio.name)).toBe(0.75);
    expect(task.getStatus()).toMatchObject({ name: 'sla-aggregator', runs: 2, failures: 0 });
  });

  it('completes the cycle when the prober exposes an overflowing counter', async () => {
    const registry = new MetricsRegistry();
    const stub = createFetchStub(
      { body: exposition({ success: 10, fail: 0 }) },
      {
        body: [
          'prober_create_user_scenario_success_total 1e999',
          'prober_create_user_scenario_success_fail_total 5',
          ''
        ].join('\n')
      }
    );
    const { task } = createSlaTask({
      sla: SLA_CONFIG,
      registry,
      fetchImplementation: stub.fetch,
      logger: createLoggerStub()
    });

    await task.runOnce();
    const result = await task.runOnce();

    expect(result).toMatchObject({ success: null, fail: 5, intervalRatio: 0, windowRatio: 0.5 });
    expect(registry.getValue(SLA_METRICS.currentRatio.name)).toBe(0);
    expect(registry.getValue(SLA_METRICS.windowRatio.name)).toBe(0.5);
    expect(task.getStatus()).toMatchObject({ runs: 2, failures: 0 });
  });
});
