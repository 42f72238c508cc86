import defaultRegistry, { MetricsRegistry, type MetricDefinition } from '../metrics/index.js';

export const SLA_METRICS = {
  currentRatio: {
    name: 'sla_current_ratio',
    help: 'SLA ratio for the most recent interval (success / total), value in range [0,1]',
    type: 'gauge'
  },
  windowRatio: {
    name: 'sla_window_ratio',
    help: 'SLA ratio aggregated over the sliding window (average of recent interval ratios), value in range [0,1]',
    type: 'gauge'
  },
  calculations: {
    name: 'sla_calculation_total',
    help: 'Total number of SLA calculation runs',
    type: 'counter'
  },
  requestDuration: {
    name: 'sla_prober_request_duration_seconds',
    help: 'Duration in seconds to fetch metrics from the prober',
    type: 'gauge'
  }
} as const satisfies Record<string, MetricDefinition>;

export class SlaMetricsPublisher {
  readonly registry: MetricsRegistry;

  constructor(registry: MetricsRegistry = defaultRegistry) {
    this.registry = registry;
    for (const definition of Object.values(SLA_METRICS)) {
      registry.register(definition);
    }
  }

  incrementCalculations() {
    this.registry.incrementCounter(SLA_METRICS.calculations.name);
  }

  publishRequestDuration(seconds: number) {
    this.registry.setGauge(SLA_METRICS.requestDuration.name, seconds);
  }

  publishCurrentRatio(ratio: number) {
    this.registry.setGauge(SLA_METRICS.currentRatio.name, ratio);
  }

  publishWindowRatio(ratio: number) {
    this.registry.setGauge(SLA_METRICS.windowRatio.name, ratio);
  }
}
