import { EventEmitter } from 'node:events';
import pino from 'pino';

export type MetricType = 'counter' | 'gauge';

export type MetricLabels = Record<string, string>;

export type MetricDefinition = {
  name: string;
  help: string;
  type: MetricType;
};

type MetricSample = {
  labels: MetricLabels;
  value: number;
};

type MetricState = {
  definition: MetricDefinition;
  samples: Map<string, MetricSample>;
  updatedAt: number | null;
};

type CounterMap = Record<string, number>;

type MetricSnapshot = {
  type: MetricType;
  help: string;
  value: number | null;
  samples: Array<{ labels: MetricLabels; value: number }>;
  updatedAt: string | null;
};

type LogLevelSnapshot = {
  byLevel: CounterMap;
  currentLevel: string;
  lastLevelChangeAt: string | null;
  levelChanges: CounterMap;
  lastErrorAt: string | null;
};

type MetricsSnapshot = {
  createdAt: string;
  metrics: Record<string, MetricSnapshot>;
  logs: LogLevelSnapshot;
};

type PrometheusExportOptions = {
  includeLogLevels?: boolean;
};

const LOG_LEVEL_METRIC = 'sla_monitor_log_level_total';
const LOG_LEVEL_STATE_METRIC = 'sla_monitor_log_level_state';

const LOG_LEVEL_ORDER = Object.entries(pino.levels.values)
  .sort(([, a], [, b]) => a - b)
  .map(([level]) => level.toLowerCase());

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly metrics = new Map<string, MetricState>();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;

  register(definition: MetricDefinition): MetricDefinition {
    const name = sanitizePrometheusMetricName(definition.name);
    const existing = this.metrics.get(name);
    if (existing) {
      if (existing.definition.type !== definition.type) {
        throw new Error(
          `Metric ${name} is already registered as ${existing.definition.type}, cannot register as ${definition.type}`
        );
      }
      return existing.definition;
    }

    const normalized: MetricDefinition = { ...definition, name };
    const samples = new Map<string, MetricSample>();
    samples.set('', { labels: {}, value: 0 });
    this.metrics.set(name, { definition: normalized, samples, updatedAt: null });
    return normalized;
  }

  incrementCounter(name: string, amount = 1, labels: MetricLabels = {}) {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new RangeError(`Counter ${name} can only be increased by a non-negative amount (got ${amount})`);
    }
    const state = this.requireMetric(name, 'counter');
    const sample = this.ensureSample(state, labels);
    sample.value += amount;
    state.updatedAt = Date.now();
  }

  setGauge(name: string, value: number, labels: MetricLabels = {}) {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = this.requireMetric(name, 'gauge');
    const sample = this.ensureSample(state, labels);
    sample.value = value;
    state.updatedAt = Date.now();
  }

  getValue(name: string, labels: MetricLabels = {}): number | null {
    const state = this.metrics.get(sanitizePrometheusMetricName(name));
    if (!state) {
      return null;
    }
    return state.samples.get(labelKey(labels))?.value ?? null;
  }

  incrementLogLevel(level: string) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);
    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    this.currentLogLevel = normalized;
    if (previous && previous.toLowerCase() !== normalized) {
      this.logLevelChangeCounters.set(normalized, (this.logLevelChangeCounters.get(normalized) ?? 0) + 1);
      this.lastLogLevelChangeAt = Date.now();
    }
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  /**
   * Zeroes every sample while keeping registrations, so publishers holding
   * metric names stay valid across resets.
   */
  reset() {
    for (const state of this.metrics.values()) {
      state.samples.clear();
      state.samples.set('', { labels: {}, value: 0 });
      state.updatedAt = null;
    }
    this.logLevelCounters.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.resetEmitter.emit('reset');
  }

  snapshot(): MetricsSnapshot {
    const metrics: Record<string, MetricSnapshot> = {};
    const ordered = Array.from(this.metrics.entries()).sort(([a], [b]) => a.localeCompare(b));
    for (const [name, state] of ordered) {
      const samples = Array.from(state.samples.values()).map(sample => ({
        labels: { ...sample.labels },
        value: sample.value
      }));
      metrics[name] = {
        type: state.definition.type,
        help: state.definition.help,
        value: state.samples.get('')?.value ?? null,
        samples,
        updatedAt: toIso(state.updatedAt)
      };
    }

    return {
      createdAt: new Date().toISOString(),
      metrics,
      logs: {
        byLevel: mapLogLevelCounters(this.logLevelCounters),
        currentLevel: this.currentLogLevel,
        lastLevelChangeAt: toIso(this.lastLogLevelChangeAt),
        levelChanges: mapLogLevelCounters(this.logLevelChangeCounters),
        lastErrorAt: toIso(this.lastErrorAt)
      }
    };
  }

  exportForPrometheus(options: PrometheusExportOptions = {}): string {
    const blocks: string[] = [];

    const ordered = Array.from(this.metrics.values()).sort((a, b) =>
      a.definition.name.localeCompare(b.definition.name)
    );
    for (const state of ordered) {
      const block = formatPrometheusMetric(state.definition, Array.from(state.samples.values()));
      if (block) {
        blocks.push(block);
      }
    }

    if (options.includeLogLevels ?? true) {
      blocks.push(...this.exportLogLevelBlocks());
    }

    return blocks.length > 0 ? `${blocks.join('\n')}\n` : '';
  }

  private exportLogLevelBlocks(): string[] {
    const blocks: string[] = [];
    const levelSamples = Object.entries(mapLogLevelCounters(this.logLevelCounters)).map(([level, value]) => ({
      labels: { level },
      value
    }));
    const levelBlock = formatPrometheusMetric(
      { name: LOG_LEVEL_METRIC, help: 'Total log lines grouped by pino level', type: 'counter' },
      levelSamples
    );
    if (levelBlock) {
      blocks.push(levelBlock);
    }

    const stateBlock = formatPrometheusMetric(
      { name: LOG_LEVEL_STATE_METRIC, help: 'Currently active pino log level', type: 'gauge' },
      [{ labels: { level: this.currentLogLevel }, value: 1 }]
    );
    if (stateBlock) {
      blocks.push(stateBlock);
    }
    return blocks;
  }

  private requireMetric(name: string, type: MetricType): MetricState {
    const state = this.metrics.get(sanitizePrometheusMetricName(name));
    if (!state) {
      throw new Error(`Metric ${name} is not registered`);
    }
    if (state.definition.type !== type) {
      throw new Error(`Metric ${name} is a ${state.definition.type}, not a ${type}`);
    }
    return state;
  }

  private ensureSample(state: MetricState, labels: MetricLabels): MetricSample {
    const key = labelKey(labels);
    const existing = state.samples.get(key);
    if (existing) {
      return existing;
    }
    const created: MetricSample = { labels: { ...labels }, value: 0 };
    state.samples.set(key, created);
    return created;
  }
}

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}

function labelKey(labels: MetricLabels): string {
  return formatPrometheusLabels(labels);
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => {
    const indexA = LOG_LEVEL_ORDER.indexOf(a);
    const indexB = LOG_LEVEL_ORDER.indexOf(b);
    if (indexA !== indexB) {
      return (indexA === -1 ? Number.POSITIVE_INFINITY : indexA) - (indexB === -1 ? Number.POSITIVE_INFINITY : indexB);
    }
    return a.localeCompare(b);
  });
  for (const [level, value] of ordered) {
    result[level] = value;
  }
  return result;
}

function formatPrometheusMetric(
  definition: MetricDefinition,
  samples: MetricSample[]
): string {
  const filtered = samples.filter(sample => Number.isFinite(sample.value));
  if (filtered.length === 0) {
    return '';
  }

  const metricName = sanitizePrometheusMetricName(definition.name);
  const normalized = filtered
    .map(sample => ({
      value: sample.value,
      labelString: formatPrometheusLabels(sample.labels)
    }))
    .sort((a, b) => a.labelString.localeCompare(b.labelString));

  const lines: string[] = [];
  if (definition.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(definition.help)}`);
  }
  lines.push(`# TYPE ${metricName} ${definition.type}`);
  for (const sample of normalized) {
    lines.push(`${metricName}${sample.labelString} ${formatPrometheusValue(sample.value)}`);
  }
  return lines.join('\n');
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_:]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'sla_monitor_metric';
  }
  if (/^[0-9]/.test(lower)) {
    return `sla_monitor_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'label';
  }
  if (/^[0-9]/.test(lower)) {
    return `_${lower}`;
  }
  return lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: MetricLabels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const normalized = entries.map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  normalized.sort(([a], [b]) => a.localeCompare(b));
  const rendered = normalized.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 && fixed !== '-0' ? fixed : '0';
}

const defaultRegistry = new MetricsRegistry();

export type { MetricsSnapshot, MetricSnapshot, LogLevelSnapshot, PrometheusExportOptions };
export { MetricsRegistry };
export default defaultRegistry;
