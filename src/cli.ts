import process from 'node:process';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, setLogLevel } from './logger.js';
import type { MetricsRegistry } from './metrics/index.js';
import type { ShutdownHookResult } from './app.js';
import { loadConfig, loadConfigFromFile, type SlaMonitorConfig } from './config/index.js';
import { startAggregator } from './run-aggregator.js';
import { startProber } from './run-prober.js';
import { createSlaTask } from './sla/runner.js';

type Writable = Pick<NodeJS.WritableStream, 'write'>;

export type CliIo = {
  stdout: Writable;
  stderr: Writable;
};

export type CliDependencies = {
  registry?: MetricsRegistry;
  fetchImplementation?: typeof fetch;
  waitForShutdown?: () => Promise<NodeJS.Signals>;
};

type Command = 'aggregate' | 'probe' | 'help';

type ParsedArgs = {
  command: Command;
  once: boolean;
  pretty: boolean;
  configPath: string | null;
  logLevel: string | null;
  errors: string[];
};

const COMMANDS: readonly Command[] = ['aggregate', 'probe', 'help'];

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function printUsage(target: Writable) {
  target.write(
    [
      'SLA monitor',
      '',
      'Usage:',
      '  sla-monitor [aggregate] [--once] [--pretty] [-c <path>] [--log-level <level>]',
      '  sla-monitor probe [-c <path>] [--log-level <level>]',
      '',
      'Commands:',
      '  aggregate      Scrape prober counters and export rolling SLA gauges (default)',
      '  probe          Run the create user scenario and export its counters',
      '  help           Show this help message',
      '',
      'Options:',
      '  --once         Run a single aggregation cycle and print the result as JSON',
      '  --pretty       Pretty-print JSON output with indentation',
      '  -c, --config <path>    Load configuration from an alternate JSON file',
      `  --log-level <level>    Override the configured log level (${getAvailableLogLevels().join(', ')})`,
      '  -h, --help     Show this help message'
    ].join('\n') + '\n'
  );
}

function takeValue(argv: string[], index: number, token: string, parsed: ParsedArgs): string | null {
  const next = argv[index + 1];
  if (!next || next.startsWith('-')) {
    parsed.errors.push(`Missing value for ${token}`);
    return null;
  }
  return next;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    command: 'aggregate',
    once: false,
    pretty: false,
    configPath: null,
    logLevel: null,
    errors: []
  };
  let commandSeen = false;

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    if (token === '--config' || token === '-c' || token === '--log-level') {
      const value = takeValue(argv, index, token, parsed);
      if (value !== null) {
        if (token === '--log-level') {
          parsed.logLevel = value;
        } else {
          parsed.configPath = value;
        }
        index += 1;
      }
      continue;
    }

    if (token.startsWith('--config=') || token.startsWith('--log-level=')) {
      const [flag, value] = token.split(/=(.*)/s, 2);
      if (!value) {
        parsed.errors.push(`Missing value for ${flag}`);
      } else if (flag === '--log-level') {
        parsed.logLevel = value;
      } else {
        parsed.configPath = value;
      }
      continue;
    }

    switch (token) {
      case '--once':
        parsed.once = true;
        break;
      case '--pretty':
      case '-p':
        parsed.pretty = true;
        break;
      case '--help':
      case '-h':
        parsed.command = 'help';
        commandSeen = true;
        break;
      default:
        if (!commandSeen && isCommand(token)) {
          parsed.command = token;
          commandSeen = true;
        } else {
          parsed.errors.push(`Unknown option: ${token}`);
        }
        break;
    }
  }

  if (parsed.once && parsed.command !== 'aggregate') {
    parsed.errors.push('--once is only supported by the aggregate command');
  }

  return parsed;
}

function resolveConfig(configPath: string | null): SlaMonitorConfig {
  return configPath ? loadConfigFromFile(configPath) : loadConfig();
}

function waitForProcessSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
    const handle = (signal: NodeJS.Signals) => {
      for (const entry of signals) {
        process.off(entry, handle);
      }
      resolve(signal);
    };
    for (const signal of signals) {
      process.once(signal, handle);
    }
  });
}

function writeJson(io: CliIo, payload: unknown, pretty: boolean) {
  io.stdout.write(`${pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload)}\n`);
}

export async function runCli(argv: string[], io: CliIo, deps: CliDependencies = {}): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.errors.length > 0) {
    for (const error of parsed.errors) {
      io.stderr.write(`${error}\n`);
    }
    printUsage(io.stderr);
    return 1;
  }

  if (parsed.command === 'help') {
    printUsage(io.stdout);
    return 0;
  }

  let config: SlaMonitorConfig;
  try {
    config = resolveConfig(parsed.configPath);
    setLogLevel(parsed.logLevel ?? config.logging.level);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ err: error }, 'Invalid configuration');
    io.stderr.write(`Invalid configuration: ${message}\n`);
    return 1;
  }

  if (parsed.command === 'aggregate' && parsed.once) {
    const { task } = createSlaTask({
      sla: config.sla,
      registry: deps.registry,
      fetchImplementation: deps.fetchImplementation
    });
    const result = await task.runOnce();
    writeJson(io, result, parsed.pretty);
    return result ? 0 : 1;
  }

  const waitForShutdown = deps.waitForShutdown ?? waitForProcessSignal;

  if (parsed.command === 'probe') {
    if (!config.prober) {
      io.stderr.write('Invalid configuration: config.prober is required for the probe command\n');
      return 1;
    }
    const runtime = await startProber(config.prober, deps);
    return awaitShutdown(runtime, waitForShutdown);
  }

  const runtime = await startAggregator(config, deps);
  return awaitShutdown(runtime, waitForShutdown);
}

async function awaitShutdown(
  runtime: { stop: (reason: string, signal?: NodeJS.Signals) => Promise<ShutdownHookResult[]> },
  waitForShutdown: () => Promise<NodeJS.Signals>
): Promise<number> {
  const signal = await waitForShutdown();
  const hooks = await runtime.stop('signal', signal);
  for (const hook of hooks) {
    if (hook.status === 'error') {
      logger.error({ err: hook.error, hook: hook.name }, 'Shutdown hook failed');
    }
  }
  logger.info({ signal }, 'Received termination signal. Exiting.');
  return 0;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr })
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error({ err: error }, 'SLA monitor failed');
      process.exitCode = 1;
    });
}
