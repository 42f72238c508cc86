import { beforeEach, describe, expect, it } from 'vitest';
import {
  buildHealthPayload,
  registerHealthIndicator,
  registerShutdownHook,
  resetAppLifecycle,
  runShutdownHooks
} from '../src/app.js';
import { createSlaHealthIndicator } from '../src/sla/health.js';
import type { SlaCycleResult } from '../src/sla/runner.js';
import type { PeriodicTaskStatus } from '../src/tasks/periodicTask.js';
import { MetricsRegistry } from '../src/metrics/index.js';

const TASK_STATUS: PeriodicTaskStatus = {
  name: 'sla-aggregator',
  started: true,
  stopped: false,
  running: false,
  runs: 1,
  failures: 0,
  lastRunAt: '2024-01-01T00:00:00.000Z',
  lastError: null
};

function cycle(overrides: Partial<SlaCycleResult> = {}): SlaCycleResult {
  return {
    success: 10,
    fail: 0,
    fetchOutcome: 'ok',
    fetchStatus: 200,
    requestDurationSeconds: 0.1,
    intervalRatio: 1,
    windowRatio: 1,
    windowSize: 1,
    completedAt: '2024-01-01T00:00:00.000Z',
    ...overrides
  };
}

const context = { metrics: new MetricsRegistry().snapshot() };

describe('HealthPayload', () => {
  beforeEach(() => {
    resetAppLifecycle();
  });

  it('is ok without indicators', async () => {
    const payload = await buildHealthPayload(context);
    expect(payload.status).toBe('ok');
    expect(payload.checks).toEqual([]);
  });

  it('reports the worst indicator status', async () => {
    registerHealthIndicator('first', () => ({ status: 'ok' }));
    registerHealthIndicator('second', () => ({ status: 'starting' }));
    expect((await buildHealthPayload(context)).status).toBe('starting');

    registerHealthIndicator('third', async () => ({ status: 'degraded', details: { reason: 'scrape failed' } }));
    const payload = await buildHealthPayload(context);
    expect(payload.status).toBe('degraded');
    expect(payload.checks).toEqual([
      { name: 'first', status: 'ok', details: undefined },
      { name: 'second', status: 'starting', details: undefined },
      { name: 'third', status: 'degraded', details: { reason: 'scrape failed' } }
    ]);
  });

  it('marks a throwing indicator as degraded', async () => {
    registerHealthIndicator('broken', () => {
      throw new Error('indicator exploded');
    });

    const payload = await buildHealthPayload(context);

    expect(payload.status).toBe('degraded');
    expect(payload.checks[0]).toEqual({ name: 'broken', status: 'degraded', details: { error: 'indicator exploded' } });
  });

  it('stops reporting an unregistered indicator', async () => {
    const unregister = registerHealthIndicator('temporary', () => ({ status: 'degraded' }));
    unregister();

    expect((await buildHealthPayload(context)).status).toBe('ok');
  });
});

describe('ShutdownHooks', () => {
  beforeEach(() => {
    resetAppLifecycle();
  });

  it('runs hooks in reverse registration order and captures failures', async () => {
    const order: string[] = [];
    registerShutdownHook('metrics-server', () => {
      order.push('metrics-server');
    });
    registerShutdownHook('sla-task', async () => {
      order.push('sla-task');
      throw new Error('task did not stop');
    });

    const results = await runShutdownHooks({ reason: 'test', signal: 'SIGTERM' });

    expect(order).toEqual(['sla-task', 'metrics-server']);
    expect(results).toEqual([
      { name: 'sla-task', status: 'error', error: new Error('task did not stop') },
      { name: 'metrics-server', status: 'ok' }
    ]);
  });

  it('reports stopping once shutdown has begun', async () => {
    await runShutdownHooks({ reason: 'test' });

    expect((await buildHealthPayload(context)).status).toBe('stopping');
  });
});

describe('SlaHealthIndicator', () => {
  it('is starting before the first cycle', async () => {
    const indicator = createSlaHealthIndicator({ lastCycle: () => null, taskStatus: () => TASK_STATUS });

    expect(await indicator(context)).toEqual({ status: 'starting', details: { task: TASK_STATUS } });
  });

  it('is degraded while the prober cannot be scraped', async () => {
    const indicator = createSlaHealthIndicator({
      lastCycle: () => cycle({ fetchOutcome: 'timeout', fetchStatus: null, intervalRatio: null }),
      taskStatus: () => TASK_STATUS
    });

    expect(await indicator(context)).toMatchObject({
      status: 'degraded',
      details: { fetchOutcome: 'timeout', intervalRatio: null, windowRatio: 1 }
    });
  });

  it('is ok after a successful scrape', async () => {
    const indicator = createSlaHealthIndicator({ lastCycle: () => cycle(), taskStatus: () => TASK_STATUS });

    expect(await indicator(context)).toMatchObject({ status: 'ok', details: { windowRatio: 1, windowSize: 1 } });
  });
});
