import http, { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import logger from '../logger.js';
import defaultRegistry, { type MetricsRegistry } from '../metrics/index.js';
import { buildHealthPayload, type HealthPayload } from '../app.js';

const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export interface HttpServerOptions {
  port?: number;
  host?: string;
  metrics?: MetricsRegistry;
  health?: () => Promise<HealthPayload>;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

type RequestHandler = (req: IncomingMessage, res: ServerResponse) => void;

function sendJson(res: ServerResponse, statusCode: number, body: unknown, headOnly = false) {
  const payload = JSON.stringify(body);
  res.writeHead(statusCode, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload)
  });
  res.end(headOnly ? undefined : payload);
}

function healthStatusCode(payload: HealthPayload): number {
  return payload.status === 'ok' || payload.status === 'starting' ? 200 : 503;
}

export function createRequestHandler(options: Pick<HttpServerOptions, 'metrics' | 'health'> = {}): RequestHandler {
  const registry = options.metrics ?? defaultRegistry;
  const health = options.health ?? (() => buildHealthPayload({ metrics: registry.snapshot() }));

  const handle = async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';
    const route = url.pathname.replace(/\/+$/, '') || '/';

    if (route !== '/metrics' && route !== '/health') {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }

    if (method !== 'GET' && method !== 'HEAD') {
      res.setHeader('Allow', 'GET, HEAD');
      sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    const headOnly = method === 'HEAD';

    if (route === '/metrics') {
      const body = registry.exportForPrometheus();
      res.writeHead(200, {
        'Content-Type': PROMETHEUS_CONTENT_TYPE,
        'Content-Length': Buffer.byteLength(body)
      });
      res.end(headOnly ? undefined : body);
      return;
    }

    const payload = await health();
    sendJson(res, healthStatusCode(payload), payload, headOnly);
  };

  return (req, res) => {
    handle(req, res).catch(error => {
      logger.error({ err: error, url: req.url }, 'HTTP request failed');
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal server error' });
      } else {
        res.end();
      }
    });
  };
}

export async function startHttpServer(options: HttpServerOptions = {}): Promise<HttpServerRuntime> {
  const port = options.port ?? 9091;
  const host = options.host ?? '0.0.0.0';

  const server = http.createServer(createRequestHandler(options));

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'Metrics server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        server.closeAllConnections();
      })
  };
}

export default startHttpServer;
