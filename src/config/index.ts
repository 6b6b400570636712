import dotenv from 'dotenv';
import { ConfigSchema, type AppConfig } from './schema.js';

dotenv.config();

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    server: {
      port: int(env.PORT, 8081),
      bindAddress: env.BIND_ADDRESS || '0.0.0.0',
      root: env.SERVE_ROOT || 'public',
      shutdownGracePeriodS: int(env.SHUTDOWN_GRACE_PERIOD_S, 5),
    },
    throttle: {
      rate: env.RATE || 'unlimited',
      mode: env.THROTTLE_MODE || 'ip',
      reapDelayMs: int(env.REAP_DELAY_MS, 3_600_000),
      rateFilePath: env.RATE_FILE_PATH || undefined,
      rateFilePollMs: int(env.RATE_FILE_POLL_MS, 5_000),
    },
    health: {
      port: int(env.HEALTH_PORT, 8080),
      bindAddress: env.HEALTH_BIND_ADDRESS || '127.0.0.1',
    },
    logLevel: env.LOG_LEVEL || 'info',
  };

  return ConfigSchema.parse(rawConfig);
}

function int(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = parseInt(value, 10);
  return isNaN(n) ? fallback : n;
}
