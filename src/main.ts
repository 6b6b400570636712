#!/usr/bin/env node
import { loadConfig } from './config/index.js';
import { RateWatcher } from './config/rate-watcher.js';
import { startThrottleServer } from './server/http-server.js';
import { startHealthServer, setReady } from './monitoring/health.js';
import { logger } from './monitoring/logger.js';

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;

  const throttle = startThrottleServer(config);

  const healthServer = startHealthServer(config.health.port, config.health.bindAddress, () => ({
    mode: throttle.policy.mode,
    activeClients: throttle.policy.activeKeys,
  }));

  let watcher: RateWatcher | null = null;
  if (config.throttle.rateFilePath) {
    watcher = new RateWatcher({
      filePath: config.throttle.rateFilePath,
      pollIntervalMs: config.throttle.rateFilePollMs,
      onRate: (rate) => throttle.policy.setRate(rate),
    });
    watcher.start();
  }

  setReady(true);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    setReady(false);
    watcher?.stop();

    await throttle.shutdown();
    healthServer.close();

    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.once('SIGTERM', () => onSignal('SIGTERM'));
  process.once('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
