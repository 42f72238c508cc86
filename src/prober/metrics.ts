import defaultRegistry, { MetricsRegistry, type MetricDefinition } from '../metrics/index.js';

export const PROBER_METRICS = {
  total: {
    name: 'prober_create_user_scenario_total',
    help: 'Total count of runs the create user scenario to oncall API',
    type: 'counter'
  },
  success: {
    name: 'prober_create_user_scenario_success_total',
    help: 'Total count of success runs the create user scenario',
    type: 'counter'
  },
  fail: {
    name: 'prober_create_user_scenario_success_fail_total',
    help: 'Total count of failed runs the create user scenario',
    type: 'counter'
  },
  duration: {
    name: 'prober_create_user_scenario_duration_seconds',
    help: 'Duration in seconds of runs the create user scenario',
    type: 'gauge'
  }
} as const satisfies Record<string, MetricDefinition>;

export function registerProberMetrics(registry: MetricsRegistry = defaultRegistry): MetricsRegistry {
  for (const definition of Object.values(PROBER_METRICS)) {
    registry.register(definition);
  }
  return registry;
}
