import { z } from 'zod';
import { RateConfigError } from '../core/errors.js';
import { parseRate, type RateOpts } from '../core/rate.js';
import { MAX_DELAY_MS } from '../utils/sleep.js';

/** Rate text such as `512Kbps` or `128/100ms`, parsed into RateOpts. */
export const RateTextSchema = z.string().transform((text, ctx): RateOpts => {
  try {
    return parseRate(text);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof RateConfigError ? err.message : String(err),
    });
    return z.NEVER;
  }
});

const ServerSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8081),
  bindAddress: z.string().default('0.0.0.0'),
  root: z.string().min(1).default('public'),
  shutdownGracePeriodS: z.number().int().min(0).default(5),
});

const ThrottleSchema = z.object({
  rate: RateTextSchema.default('unlimited'),
  mode: z.enum(['request', 'global', 'ip']).default('ip'),
  reapDelayMs: z.number().int().min(0).max(MAX_DELAY_MS).default(3_600_000), // 1 hour
  rateFilePath: z.string().min(1).optional(),
  rateFilePollMs: z.number().int().min(100).max(MAX_DELAY_MS).default(5_000),
});

const HealthSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8080),
  bindAddress: z.string().default('127.0.0.1'),
});

/** Contents of the watched rate file. */
export const RateFileSchema = z.object({
  rate: RateTextSchema,
});

const ConfigSchema = z.object({
  server: ServerSchema.default({}),
  throttle: ThrottleSchema.default({}),
  health: HealthSchema.default({}),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type AppConfig = z.output<typeof ConfigSchema>;
export type ThrottleConfig = z.output<typeof ThrottleSchema>;

export { ConfigSchema, ThrottleSchema };
