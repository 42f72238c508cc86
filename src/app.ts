import metrics, { type MetricsSnapshot } from './metrics/index.js';

export type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

export type HealthIndicatorContext = {
  metrics: MetricsSnapshot;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type HealthCheck = {
  name: string;
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthPayload = {
  status: HealthStatus;
  startedAt: string;
  uptimeSeconds: number;
  timestamp: string;
  checks: HealthCheck[];
};

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

export type ShutdownHookResult = {
  name: string;
  status: 'ok' | 'error';
  error?: Error;
};

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const healthIndicators: RegisteredIndicator[] = [];
const shutdownHooks: RegisteredHook[] = [];
let startedAt = Date.now();
let stopping = false;

const STATUS_PRIORITY: Record<HealthStatus, number> = {
  ok: 0,
  starting: 1,
  stopping: 2,
  degraded: 3
};

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  const existingIndex = healthIndicators.findIndex(entry => entry.name === name);
  const entry: RegisteredIndicator = { name, indicator };
  if (existingIndex >= 0) {
    healthIndicators[existingIndex] = entry;
  } else {
    healthIndicators.push(entry);
  }

  return () => {
    const index = healthIndicators.findIndex(item => item.name === name);
    if (index >= 0) {
      healthIndicators.splice(index, 1);
    }
  };
}

export async function collectHealthChecks(context?: Partial<HealthIndicatorContext>): Promise<HealthCheck[]> {
  const results: HealthCheck[] = [];
  const enrichedContext: HealthIndicatorContext = {
    metrics: context?.metrics ?? metrics.snapshot()
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.indicator(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: {
          error: error instanceof Error ? error.message : String(error)
        }
      });
    }
  }
  return results;
}

/**
 * Worst status across all registered indicators; `stopping` once shutdown has
 * begun.
 */
export async function buildHealthPayload(context?: Partial<HealthIndicatorContext>): Promise<HealthPayload> {
  const checks = await collectHealthChecks(context);
  let status: HealthStatus = stopping ? 'stopping' : 'ok';
  for (const check of checks) {
    if (STATUS_PRIORITY[check.status] > STATUS_PRIORITY[status]) {
      status = check.status;
    }
  }
  const now = Date.now();
  return {
    status,
    startedAt: new Date(startedAt).toISOString(),
    uptimeSeconds: Math.max(0, Math.round((now - startedAt) / 1000)),
    timestamp: new Date(now).toISOString(),
    checks
  };
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext): Promise<ShutdownHookResult[]> {
  stopping = true;
  const results: ShutdownHookResult[] = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'error',
        error: error instanceof Error ? error : new Error(String(error))
      });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
  startedAt = Date.now();
  stopping = false;
}
