import loggerModule from '../logger.js';
import type { MetricsRegistry } from '../metrics/index.js';
import type { SlaConfig } from '../config/index.js';
import { PeriodicTask } from '../tasks/periodicTask.js';
import { SlaAggregator } from './aggregator.js';
import { MetricFetcher, type FetchOutcome, type MetricSource } from './fetcher.js';
import { SlaMetricsPublisher } from './metrics.js';

type RunnerLogger = Pick<typeof loggerModule, 'info' | 'debug'>;

export interface SlaCycleDependencies {
  source: MetricSource;
  aggregator: SlaAggregator;
  publisher: SlaMetricsPublisher;
  logger?: RunnerLogger;
}

export type SlaCycleResult = {
  success: number | null;
  fail: number | null;
  fetchOutcome: FetchOutcome;
  fetchStatus: number | null;
  requestDurationSeconds: number;
  intervalRatio: number | null;
  windowRatio: number | null;
  windowSize: number;
  completedAt: string;
};

/**
 * One scrape cycle: fetch the prober counters, fold them into the aggregator
 * and publish the resulting gauges. Undefined ratios are published as 0.
 */
export async function runSlaCycle(deps: SlaCycleDependencies, signal?: AbortSignal): Promise<SlaCycleResult> {
  const logger = deps.logger ?? loggerModule;
  const { aggregator, publisher } = deps;

  publisher.incrementCalculations();

  const sample = await deps.source.fetch(signal);
  publisher.publishRequestDuration(sample.durationSeconds);

  const intervalRatio = aggregator.computeInterval(sample.success, sample.fail);
  if (intervalRatio === null) {
    publisher.publishCurrentRatio(0);
    logger.debug('SLA for this interval is undefined; current gauge set to 0, window unchanged');
  } else {
    publisher.publishCurrentRatio(intervalRatio);
    aggregator.addToWindow(intervalRatio);
    logger.info({ ratio: Number(intervalRatio.toFixed(4)) }, 'SLA interval ratio computed');
  }

  const windowRatio = aggregator.windowAverage();
  if (windowRatio === null) {
    publisher.publishWindowRatio(0);
    logger.debug('SLA window is empty; window gauge set to 0');
  } else {
    publisher.publishWindowRatio(windowRatio);
    logger.info(
      { ratio: Number(windowRatio.toFixed(4)), intervals: aggregator.windowSize },
      'SLA window ratio computed'
    );
  }

  return {
    success: sample.success,
    fail: sample.fail,
    fetchOutcome: sample.outcome,
    fetchStatus: sample.status,
    requestDurationSeconds: sample.durationSeconds,
    intervalRatio,
    windowRatio,
    windowSize: aggregator.windowSize,
    completedAt: new Date().toISOString()
  };
}

export interface SlaTaskOptions {
  sla: SlaConfig;
  registry?: MetricsRegistry;
  source?: MetricSource;
  fetchImplementation?: typeof fetch;
  onCycle?: (result: SlaCycleResult) => void;
  logger?: RunnerLogger & Pick<typeof loggerModule, 'warn' | 'error'>;
}

export type SlaTaskRuntime = {
  task: PeriodicTask<SlaCycleResult>;
  aggregator: SlaAggregator;
  publisher: SlaMetricsPublisher;
};

export function createSlaTask(options: SlaTaskOptions): SlaTaskRuntime {
  const { sla } = options;
  const logger = options.logger ?? loggerModule;
  const source =
    options.source ??
    new MetricFetcher({
      url: sla.proberMetricsUrl,
      timeoutMs: sla.requestTimeoutSeconds * 1000,
      successMetric: sla.successMetric,
      failMetric: sla.failMetric,
      fetchImplementation: options.fetchImplementation,
      logger
    });
  const aggregator = new SlaAggregator({ windowSize: sla.windowSize, logger });
  const publisher = new SlaMetricsPublisher(options.registry);

  const task = new PeriodicTask<SlaCycleResult>({
    name: 'sla-aggregator',
    intervalMs: sla.scrapeIntervalSeconds * 1000,
    run: signal => runSlaCycle({ source, aggregator, publisher, logger }, signal),
    onResult: options.onCycle,
    logger
  });

  return { task, aggregator, publisher };
}
