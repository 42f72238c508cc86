import { performance } from 'node:perf_hooks';
import loggerModule from '../logger.js';
import { combineAbortSignals } from '../utils/abort.js';

type FetcherLogger = Pick<typeof loggerModule, 'debug' | 'error'>;

export type FetchOutcome = 'ok' | 'http-error' | 'transport-error' | 'timeout' | 'aborted';

export type ProberMetricsSample = {
  success: number | null;
  fail: number | null;
  durationSeconds: number;
  outcome: FetchOutcome;
  status: number | null;
};

export interface MetricSource {
  fetch(signal?: AbortSignal): Promise<ProberMetricsSample>;
}

export interface MetricFetcherOptions {
  url: string;
  timeoutMs: number;
  successMetric: string;
  failMetric: string;
  fetchImplementation?: typeof fetch;
  logger?: FetcherLogger;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Value of the first exposition line for `metricName`, ignoring its label
 * block. Returns `null` when no line matches or the value is not a finite
 * number.
 */
export function parseMetricValue(metricsText: string, metricName: string): number | null {
  const pattern = new RegExp(`^${escapeRegExp(metricName)}(?:\\{[^}]*\\})?\\s+([0-9.eE+\\-]+)\\s*$`, 'm');
  const match = pattern.exec(metricsText);
  const raw = match?.[1];
  if (raw === undefined) {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export class MetricFetcher implements MetricSource {
  private readonly options: MetricFetcherOptions;
  private readonly logger: FetcherLogger;
  private readonly fetchImplementation: typeof fetch;

  constructor(options: MetricFetcherOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
    this.fetchImplementation = options.fetchImplementation ?? globalThis.fetch;
  }

  async fetch(signal?: AbortSignal): Promise<ProberMetricsSample> {
    const startedAt = performance.now();
    const elapsedSeconds = () => (performance.now() - startedAt) / 1000;

    const timeoutController = new AbortController();
    const timeoutId = setTimeout(() => timeoutController.abort(), this.options.timeoutMs);
    const requestSignal = signal ? combineAbortSignals(timeoutController.signal, signal) : timeoutController.signal;

    try {
      const response = await this.fetchImplementation(this.options.url, {
        method: 'GET',
        headers: { accept: 'text/plain' },
        signal: requestSignal
      });

      if (!response.ok) {
        this.logger.error({ status: response.status, url: this.options.url }, 'Prober returned non-success status');
        await response.body?.cancel();
        return this.absent('http-error', elapsedSeconds(), response.status);
      }

      const text = await response.text();
      const success = parseMetricValue(text, this.options.successMetric);
      const fail = parseMetricValue(text, this.options.failMetric);

      if (success === null) {
        this.logger.debug({ metric: this.options.successMetric }, 'Success metric not found in prober metrics');
      }
      if (fail === null) {
        this.logger.debug({ metric: this.options.failMetric }, 'Fail metric not found in prober metrics');
      }

      return { success, fail, durationSeconds: elapsedSeconds(), outcome: 'ok', status: response.status };
    } catch (error) {
      const outcome: FetchOutcome = timeoutController.signal.aborted
        ? 'timeout'
        : signal?.aborted
          ? 'aborted'
          : 'transport-error';
      this.logger.error({ err: error, outcome, url: this.options.url }, 'Error fetching prober metrics');
      return this.absent(outcome, elapsedSeconds(), null);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private absent(outcome: FetchOutcome, durationSeconds: number, status: number | null): ProberMetricsSample {
    return { success: null, fail: null, durationSeconds, outcome, status };
  }
}
