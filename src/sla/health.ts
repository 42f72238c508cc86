import type { HealthIndicator } from '../app.js';
import type { PeriodicTaskStatus } from '../tasks/periodicTask.js';
import type { SlaCycleResult } from './runner.js';

export interface SlaHealthSource {
  lastCycle: () => SlaCycleResult | null;
  taskStatus: () => PeriodicTaskStatus;
}

/**
 * `starting` until the first cycle completes, `degraded` while the prober
 * endpoint cannot be scraped.
 */
export function createSlaHealthIndicator(source: SlaHealthSource): HealthIndicator {
  return () => {
    const task = source.taskStatus();
    const cycle = source.lastCycle();
    if (!cycle) {
      return { status: 'starting', details: { task } };
    }

    const details = {
      task,
      fetchOutcome: cycle.fetchOutcome,
      fetchStatus: cycle.fetchStatus,
      intervalRatio: cycle.intervalRatio,
      windowRatio: cycle.windowRatio,
      windowSize: cycle.windowSize,
      completedAt: cycle.completedAt
    };

    if (cycle.fetchOutcome !== 'ok') {
      return { status: 'degraded', details };
    }
    return { status: 'ok', details };
  };
}
