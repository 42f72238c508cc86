import { performance } from 'node:perf_hooks';
import loggerModule from '../logger.js';
import type { MetricsRegistry } from '../metrics/index.js';
import type { ProberConfig } from '../config/index.js';
import { PeriodicTask } from '../tasks/periodicTask.js';
import { combineAbortSignals } from '../utils/abort.js';
import { PROBER_METRICS, registerProberMetrics } from './metrics.js';

type ProberLogger = Pick<typeof loggerModule, 'info' | 'debug' | 'error'>;

export interface CreateUserScenarioOptions {
  apiUrl: string;
  username: string;
  timeoutMs: number;
  registry?: MetricsRegistry;
  fetchImplementation?: typeof fetch;
  logger?: ProberLogger;
}

export type ProbeResult = {
  success: boolean;
  createStatus: number | null;
  deleteStatus: number | null;
  durationSeconds: number;
};

/**
 * Synthetic transaction against the oncall API: create a throwaway user and
 * delete it again. Each probe counts exactly one success or one failure.
 */
export class CreateUserScenarioProber {
  private readonly options: CreateUserScenarioOptions;
  private readonly registry: MetricsRegistry;
  private readonly logger: ProberLogger;
  private readonly fetchImplementation: typeof fetch;
  private readonly baseUrl: string;

  constructor(options: CreateUserScenarioOptions) {
    this.options = options;
    this.registry = registerProberMetrics(options.registry);
    this.logger = options.logger ?? loggerModule;
    this.fetchImplementation = options.fetchImplementation ?? globalThis.fetch;
    this.baseUrl = options.apiUrl.replace(/\/+$/, '');
  }

  async probe(signal?: AbortSignal): Promise<ProbeResult> {
    this.registry.incrementCounter(PROBER_METRICS.total.name);
    const startedAt = performance.now();

    this.logger.debug({ username: this.options.username }, 'Creating probe user');
    const createStatus = await this.request(
      `${this.baseUrl}/users`,
      {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ name: this.options.username })
      },
      signal
    );

    // cleanup ignores the shutdown signal; only its own timeout bounds it
    const deleteStatus = await this.request(`${this.baseUrl}/users/${encodeURIComponent(this.options.username)}`, {
      method: 'DELETE'
    });

    const success = createStatus === 200 && deleteStatus === 200;
    if (success) {
      this.registry.incrementCounter(PROBER_METRICS.success.name);
      this.logger.debug('Create user scenario succeeded');
    } else {
      this.registry.incrementCounter(PROBER_METRICS.fail.name);
      this.logger.debug({ createStatus, deleteStatus }, 'Create user scenario failed');
    }

    const durationSeconds = (performance.now() - startedAt) / 1000;
    this.registry.setGauge(PROBER_METRICS.duration.name, durationSeconds);

    return { success, createStatus, deleteStatus, durationSeconds };
  }

  private async request(url: string, init: RequestInit, signal?: AbortSignal): Promise<number | null> {
    const timeoutController = new AbortController();
    const timeoutId = setTimeout(() => timeoutController.abort(), this.options.timeoutMs);
    const requestSignal = signal ? combineAbortSignals(timeoutController.signal, signal) : timeoutController.signal;
    try {
      const response = await this.fetchImplementation(url, { ...init, signal: requestSignal });
      await response.body?.cancel();
      return response.status;
    } catch (error) {
      this.logger.debug({ err: error, url, method: init.method }, 'Probe request failed');
      return null;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export interface ProberTaskOptions {
  prober: ProberConfig;
  registry?: MetricsRegistry;
  fetchImplementation?: typeof fetch;
  onResult?: (result: ProbeResult) => void;
  logger?: ProberLogger;
}

export function createProberTask(options: ProberTaskOptions): PeriodicTask<ProbeResult> {
  const { prober } = options;
  const scenario = new CreateUserScenarioProber({
    apiUrl: prober.apiUrl,
    username: prober.username,
    timeoutMs: prober.requestTimeoutSeconds * 1000,
    registry: options.registry,
    fetchImplementation: options.fetchImplementation,
    logger: options.logger
  });

  return new PeriodicTask<ProbeResult>({
    name: 'create-user-prober',
    intervalMs: prober.intervalSeconds * 1000,
    run: signal => scenario.probe(signal),
    onResult: options.onResult,
    logger: options.logger
  });
}
