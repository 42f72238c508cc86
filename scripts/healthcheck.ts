import process from 'node:process';
import { fileURLToPath } from 'node:url';
import { loadConfig, loadConfigFromFile, type SlaMonitorConfig } from '../src/config/index.js';

type Writable = Pick<NodeJS.WritableStream, 'write'>;

type IoStreams = {
  stdout: Writable;
  stderr: Writable;
};

type HealthcheckDependencies = {
  fetchImplementation?: typeof fetch;
  timeoutMs?: number;
};

function printUsage(target: Writable) {
  target.write(
    [
      'SLA monitor healthcheck helper',
      '',
      'Usage:',
      '  tsx scripts/healthcheck.ts [--pretty] [--url <url>] [-c <path>]',
      '',
      'Options:',
      '  --pretty             Pretty-print JSON output with indentation',
      '  --url <url>          Health endpoint to query (default: http://127.0.0.1:<server.port>/health)',
      '  -c, --config <path>  Load configuration from alternate file to resolve the port',
      '  -h, --help           Show this help message'
    ].join('\n') + '\n'
  );
}

type ParsedArgs = {
  pretty: boolean;
  help: boolean;
  errors: string[];
  configPath: string | null;
  url: string | null;
};

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { pretty: false, help: false, errors: [], configPath: null, url: null };
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    if (token === '--config' || token === '-c' || token === '--url') {
      const next = argv[index + 1];
      if (!next) {
        parsed.errors.push(`Missing value for ${token}`);
      } else {
        if (token === '--url') {
          parsed.url = next;
        } else {
          parsed.configPath = next;
        }
        index += 1;
      }
      continue;
    }

    switch (token) {
      case '--pretty':
      case '-p':
        parsed.pretty = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        parsed.errors.push(`Unknown option: ${token}`);
        break;
    }
  }
  return parsed;
}

function resolveHealthUrl(parsed: ParsedArgs): string {
  if (parsed.url) {
    return parsed.url;
  }
  const config: SlaMonitorConfig = parsed.configPath ? loadConfigFromFile(parsed.configPath) : loadConfig();
  return `http://127.0.0.1:${config.server.port}/health`;
}

/**
 * Queries the running service's health endpoint. Exit code 0 only when the
 * endpoint answers 200.
 */
export async function runHealthcheck(
  argv: string[],
  io: IoStreams = { stdout: process.stdout, stderr: process.stderr },
  deps: HealthcheckDependencies = {}
): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.help) {
    printUsage(io.stdout);
    return 0;
  }

  if (parsed.errors.length > 0) {
    for (const error of parsed.errors) {
      io.stderr.write(`${error}\n`);
    }
    printUsage(io.stdout);
    return 1;
  }

  let url: string;
  try {
    url = resolveHealthUrl(parsed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Invalid configuration: ${message}\n`);
    return 1;
  }

  const fetchImplementation = deps.fetchImplementation ?? globalThis.fetch;
  try {
    const response = await fetchImplementation(url, { signal: AbortSignal.timeout(deps.timeoutMs ?? 3000) });
    const payload: unknown = await response.json();
    io.stdout.write(`${parsed.pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload)}\n`);
    return response.status === 200 ? 0 : 1;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Health endpoint unreachable: ${message}\n`);
    return 1;
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  runHealthcheck(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    });
}
