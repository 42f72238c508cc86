import loggerModule from './logger.js';
import defaultRegistry, { type MetricsRegistry } from './metrics/index.js';
import { registerHealthIndicator, registerShutdownHook, runShutdownHooks, type ShutdownHookResult } from './app.js';
import type { SlaMonitorConfig } from './config/index.js';
import { startHttpServer } from './server/http.js';
import { createSlaHealthIndicator } from './sla/health.js';
import { createSlaTask, type SlaCycleResult } from './sla/runner.js';
import type { MetricSource } from './sla/fetcher.js';

export interface AggregatorRuntimeOptions {
  registry?: MetricsRegistry;
  source?: MetricSource;
  fetchImplementation?: typeof fetch;
}

export type AggregatorRuntime = {
  port: number;
  lastCycle: () => SlaCycleResult | null;
  stop: (reason: string, signal?: NodeJS.Signals) => Promise<ShutdownHookResult[]>;
};

export async function startAggregator(
  config: SlaMonitorConfig,
  options: AggregatorRuntimeOptions = {}
): Promise<AggregatorRuntime> {
  const registry = options.registry ?? defaultRegistry;
  let lastCycle: SlaCycleResult | null = null;

  loggerModule.info(
    {
      proberMetricsUrl: config.sla.proberMetricsUrl,
      scrapeIntervalSeconds: config.sla.scrapeIntervalSeconds,
      windowSize: config.sla.windowSize,
      port: config.server.port
    },
    'Starting SLA aggregator'
  );

  const { task } = createSlaTask({
    sla: config.sla,
    registry,
    source: options.source,
    fetchImplementation: options.fetchImplementation,
    onCycle: result => {
      lastCycle = result;
    }
  });

  const server = await startHttpServer({ port: config.server.port, host: config.server.host, metrics: registry });

  const unregisterIndicator = registerHealthIndicator(
    'sla-aggregator',
    createSlaHealthIndicator({ lastCycle: () => lastCycle, taskStatus: () => task.getStatus() })
  );
  registerShutdownHook('metrics-server', () => server.close());
  registerShutdownHook('sla-task', async () => {
    await task.stop();
    unregisterIndicator();
  });

  task.start();

  let stopPromise: Promise<ShutdownHookResult[]> | null = null;

  return {
    port: server.port,
    lastCycle: () => lastCycle,
    stop: (reason, signal) => {
      if (!stopPromise) {
        loggerModule.info({ reason, signal }, 'SLA aggregator shutting down');
        stopPromise = runShutdownHooks({ reason, signal });
      }
      return stopPromise;
    }
  };
}
