import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../../src/config/index.js';
import { RateFileSchema } from '../../src/config/schema.js';

describe('loadConfig', () => {
  it('fills in defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({
      port: 8081,
      bindAddress: '0.0.0.0',
      root: 'public',
      shutdownGracePeriodS: 5,
    });
    expect(config.throttle).toEqual({
      rate: { kind: 'unlimited' },
      mode: 'ip',
      reapDelayMs: 3_600_000,
      rateFilePath: undefined,
      rateFilePollMs: 5_000,
    });
    expect(config.health).toEqual({ port: 8080, bindAddress: '127.0.0.1' });
    expect(config.logLevel).toBe('info');
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      SERVE_ROOT: '/srv/files',
      RATE: '128/100ms',
      THROTTLE_MODE: 'global',
      REAP_DELAY_MS: '0',
      RATE_FILE_PATH: 'config/rate.json',
      HEALTH_PORT: '9001',
      LOG_LEVEL: 'warn',
    });

    expect(config.server.port).toBe(9000);
    expect(config.server.root).toBe('/srv/files');
    expect(config.throttle.rate).toEqual({ kind: 'limited', intervalMs: 100, size: 128 });
    expect(config.throttle.mode).toBe('global');
    expect(config.throttle.reapDelayMs).toBe(0);
    expect(config.throttle.rateFilePath).toBe('config/rate.json');
    expect(config.health.port).toBe(9001);
    expect(config.logLevel).toBe('warn');
  });

  it('parses bit-unit rates', () => {
    expect(loadConfig({ RATE: '512Kbps' }).throttle.rate).toEqual({ kind: 'limited', intervalMs: 1000, size: 65_536 });
  });

  it('falls back to defaults for numbers that do not parse', () => {
    const config = loadConfig({ PORT: 'eighty', REAP_DELAY_MS: 'soon' });
    expect(config.server.port).toBe(8081);
    expect(config.throttle.reapDelayMs).toBe(3_600_000);
  });

  it('rejects a rate that cannot limit anything', () => {
    expect(() => loadConfig({ RATE: '0/1s' })).toThrow(ZodError);
    expect(() => loadConfig({ RATE: 'quickly' })).toThrow(ZodError);
  });

  it('rejects unknown modes and out-of-range values', () => {
    expect(() => loadConfig({ THROTTLE_MODE: 'per-planet' })).toThrow(ZodError);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(ZodError);
    expect(() => loadConfig({ REAP_DELAY_MS: '-1' })).toThrow(ZodError);
    expect(() => loadConfig({ REAP_DELAY_MS: '2592000000' })).toThrow(ZodError);
    expect(() => loadConfig({ RATE: '1/36000m' })).toThrow(ZodError);
  });
});

describe('RateFileSchema', () => {
  it('parses the rate field', () => {
    expect(RateFileSchema.parse({ rate: '1000/s' })).toEqual({
      rate: { kind: 'limited', intervalMs: 1000, size: 1000 },
    });
  });

  it('reports an unusable rate as a validation issue', () => {
    const result = RateFileSchema.safeParse({ rate: '0' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].path).toEqual(['rate']);
    expect(result.error.issues[0].message).toMatch(/^Invalid rate: size /);
  });
});
