import fs from 'node:fs';
import path from 'node:path';
import nodeConfig from 'config';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type ServerConfig = {
  host: string;
  port: number;
};

export type SlaConfig = {
  proberMetricsUrl: string;
  scrapeIntervalSeconds: number;
  windowSize: number;
  requestTimeoutSeconds: number;
  successMetric: string;
  failMetric: string;
};

export type ProberConfig = {
  apiUrl: string;
  username: string;
  intervalSeconds: number;
  requestTimeoutSeconds: number;
  host: string;
  port: number;
};

export type SlaMonitorConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  server: ServerConfig;
  sla: SlaConfig;
  prober?: ProberConfig;
};

type JsonType = 'object' | 'number' | 'string';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: false;
  enum?: string[];
  minimum?: number;
  exclusiveMinimum?: number;
  maximum?: number;
  integer?: boolean;
  minLength?: number;
};

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const portSchema: JsonSchema = { type: 'number', integer: true, minimum: 0, maximum: 65535 };

const slaMonitorConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'server', 'sla'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string', minLength: 1 }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: LOG_LEVELS }
      }
    },
    server: {
      type: 'object',
      required: ['host', 'port'],
      additionalProperties: false,
      properties: {
        host: { type: 'string', minLength: 1 },
        port: portSchema
      }
    },
    sla: {
      type: 'object',
      required: [
        'proberMetricsUrl',
        'scrapeIntervalSeconds',
        'windowSize',
        'requestTimeoutSeconds',
        'successMetric',
        'failMetric'
      ],
      additionalProperties: false,
      properties: {
        proberMetricsUrl: { type: 'string', minLength: 1 },
        scrapeIntervalSeconds: { type: 'number', exclusiveMinimum: 0 },
        windowSize: { type: 'number', integer: true, minimum: 1 },
        requestTimeoutSeconds: { type: 'number', exclusiveMinimum: 0 },
        successMetric: { type: 'string', minLength: 1 },
        failMetric: { type: 'string', minLength: 1 }
      }
    },
    prober: {
      type: 'object',
      required: ['apiUrl', 'username', 'intervalSeconds', 'requestTimeoutSeconds', 'host', 'port'],
      additionalProperties: false,
      properties: {
        apiUrl: { type: 'string', minLength: 1 },
        username: { type: 'string', minLength: 1 },
        intervalSeconds: { type: 'number', exclusiveMinimum: 0 },
        requestTimeoutSeconds: { type: 'number', exclusiveMinimum: 0 },
        host: { type: 'string', minLength: 1 },
        port: portSchema
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const errors: string[] = [];

  if (schema.type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    const required = schema.required ?? [];
    for (const key of required) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    if (schema.additionalProperties === false) {
      const definedProperties = new Set(Object.keys(schema.properties ?? {}));
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (schema.type === 'number') {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.exclusiveMinimum === 'number' && value <= schema.exclusiveMinimum) {
      errors.push(`${pathLabel} must be > ${schema.exclusiveMinimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (typeof value !== 'string') {
    errors.push(`${pathLabel} must be a string`);
    return errors;
  }

  if (typeof schema.minLength === 'number' && value.trim().length < schema.minLength) {
    errors.push(`${pathLabel} must not be empty`);
  }

  // enum values are matched case-insensitively (INFO and info are the same log level)
  if (schema.enum && !schema.enum.includes(value.trim().toLowerCase())) {
    errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
  }

  return errors;
}

const METRIC_NAME_PATTERN = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function validateLogicalConfig(config: SlaMonitorConfig) {
  const messages: string[] = [];

  if (!isHttpUrl(config.sla.proberMetricsUrl)) {
    messages.push('config.sla.proberMetricsUrl must be an http(s) URL');
  }

  for (const key of ['successMetric', 'failMetric'] as const) {
    if (!METRIC_NAME_PATTERN.test(config.sla[key])) {
      messages.push(`config.sla.${key} must be a valid metric name`);
    }
  }

  if (config.sla.successMetric === config.sla.failMetric) {
    messages.push('config.sla.successMetric and config.sla.failMetric must differ');
  }

  if (config.prober && !isHttpUrl(config.prober.apiUrl)) {
    messages.push('config.prober.apiUrl must be an http(s) URL');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

function assertMatchesSchema(config: unknown): asserts config is SlaMonitorConfig {
  const errors = validateAgainstSchema(slaMonitorConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
}

export function validateConfig(config: unknown): asserts config is SlaMonitorConfig {
  assertMatchesSchema(config);
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): SlaMonitorConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): SlaMonitorConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/**
 * Resolves the merged node-config hierarchy (`config/default.json`, the
 * `NODE_ENV` overlay and `custom-environment-variables.json`) and validates it.
 */
export function loadConfig(): SlaMonitorConfig {
  const loaded: unknown = nodeConfig.util.toObject(nodeConfig);
  validateConfig(loaded);
  return loaded;
}

