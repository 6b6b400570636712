import http from 'node:http';
import { metricsRegistry } from './metrics.js';
import { logger } from './logger.js';

/** Snapshot reported by /ready alongside the readiness flag. */
export type ReadinessDetails = () => Record<string, unknown>;

let isReady = false;

export function setReady(ready: boolean): void {
  isReady = ready;
}

export function startHealthServer(port: number, bindAddress: string, details: ReadinessDetails = () => ({})): http.Server {
  const server = http.createServer((req, res) => {
    switch (req.url) {
      case '/health':
        sendJson(res, 200, { status: 'ok' });
        return;
      case '/ready':
        sendJson(res, isReady ? 200 : 503, { ready: isReady, ...details() });
        return;
      case '/metrics':
        metricsRegistry.metrics().then(
          (metrics) => {
            res.writeHead(200, { 'Content-Type': metricsRegistry.contentType });
            res.end(metrics);
          },
          (err: unknown) => {
            logger.error({ err }, 'Failed to collect metrics');
            res.writeHead(500);
            res.end('Error collecting metrics');
          },
        );
        return;
      default:
        res.writeHead(404);
        res.end('Not found');
    }
  });

  server.listen(port, bindAddress, () => {
    logger.info({ port, bindAddress }, 'Health/metrics server listening');
  });

  return server;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}
