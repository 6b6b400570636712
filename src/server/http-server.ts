import http from 'node:http';
import type { AppConfig } from '../config/schema.js';
import { formatRate } from '../core/rate.js';
import { logger } from '../monitoring/logger.js';
import { serveFiles } from './file-handler.js';
import { ThrottlePolicy } from './throttle-policy.js';

export interface ThrottleServer {
  server: http.Server;
  policy: ThrottlePolicy;
  /** Stop accepting connections, wait for open ones up to the grace period, then force them closed. */
  shutdown: () => Promise<void>;
}

export function startThrottleServer(config: AppConfig): ThrottleServer {
  const policy = new ThrottlePolicy(serveFiles(config.server.root), {
    mode: config.throttle.mode,
    rate: config.throttle.rate,
    reapDelayMs: config.throttle.reapDelayMs,
  });

  const server = http.createServer(policy.handler);
  server.on('clientError', (err, socket) => {
    logger.debug({ err }, 'Client error');
    socket.destroy();
  });

  server.listen(config.server.port, config.server.bindAddress, () => {
    logger.info(
      {
        port: config.server.port,
        root: config.server.root,
        mode: policy.mode,
        rate: formatRate(policy.rate),
      },
      'Throttling file server listening',
    );
  });

  const shutdown = async () => {
    logger.info('Shutting down file server');

    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    server.closeIdleConnections();

    const graceMs = config.server.shutdownGracePeriodS * 1000;
    const forced = setTimeout(() => {
      logger.warn('Grace period elapsed, closing remaining connections');
      server.closeAllConnections();
    }, graceMs);

    await closed;
    clearTimeout(forced);
    policy.close();
  };

  return { server, policy, shutdown };
}
