import loggerModule from './logger.js';
import defaultRegistry, { type MetricsRegistry } from './metrics/index.js';
import { registerHealthIndicator, registerShutdownHook, runShutdownHooks, type ShutdownHookResult } from './app.js';
import type { ProberConfig } from './config/index.js';
import { startHttpServer } from './server/http.js';
import { createProberTask, type ProbeResult } from './prober/scenario.js';

export interface ProberRuntimeOptions {
  registry?: MetricsRegistry;
  fetchImplementation?: typeof fetch;
}

export type ProberRuntime = {
  port: number;
  stop: (reason: string, signal?: NodeJS.Signals) => Promise<ShutdownHookResult[]>;
};

export async function startProber(prober: ProberConfig, options: ProberRuntimeOptions = {}): Promise<ProberRuntime> {
  const registry = options.registry ?? defaultRegistry;

  loggerModule.info(
    { apiUrl: prober.apiUrl, intervalSeconds: prober.intervalSeconds, port: prober.port },
    'Starting create user prober'
  );

  let lastResult: ProbeResult | null = null;
  const task = createProberTask({
    prober,
    registry,
    fetchImplementation: options.fetchImplementation,
    onResult: result => {
      lastResult = result;
    }
  });
  const server = await startHttpServer({ port: prober.port, host: prober.host, metrics: registry });

  const unregisterIndicator = registerHealthIndicator('create-user-prober', () => {
    const status = task.getStatus();
    if (status.runs === 0) {
      return { status: 'starting', details: { task: status } };
    }
    return { status: 'ok', details: { task: status, lastProbe: lastResult } };
  });
  registerShutdownHook('metrics-server', () => server.close());
  registerShutdownHook('prober-task', async () => {
    await task.stop();
    unregisterIndicator();
  });

  task.start();

  let stopPromise: Promise<ShutdownHookResult[]> | null = null;

  return {
    port: server.port,
    stop: (reason, signal) => {
      if (!stopPromise) {
        loggerModule.info({ reason, signal }, 'Prober shutting down');
        stopPromise = runShutdownHooks({ reason, signal });
      }
      return stopPromise;
    }
  };
}
