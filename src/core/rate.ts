import { z } from 'zod';
import { RateConfigError } from './errors.js';
import { MAX_DELAY_MS } from '../utils/sleep.js';

/**
 * A throughput limit: `size` tokens (bytes) per `intervalMs`, or no limit at
 * all. Unlimited is its own variant so a zero-size rate is always an error.
 */
export type RateOpts = LimitedRate | UnlimitedRate;

export interface LimitedRate {
  kind: 'limited';
  intervalMs: number;
  size: number;
}

export interface UnlimitedRate {
  kind: 'unlimited';
}

export const UNLIMITED: UnlimitedRate = Object.freeze({ kind: 'unlimited' });

/** Bytes in a kilobit (1024 bits). */
export const Kb = 128;
export const Mb = Kb * 1024;
export const Gb = Mb * 1024;

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;

export const RateOptsSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('unlimited') }),
  z.object({
    kind: z.literal('limited'),
    intervalMs: z.number().positive().max(MAX_DELAY_MS),
    size: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  }),
]);

/** Throws a RateConfigError unless `value` is a usable rate. */
export function assertRate(value: RateOpts): RateOpts {
  const result = RateOptsSchema.safeParse(value);
  if (!result.success) {
    throw new RateConfigError(
      'Invalid rate',
      result.error.issues.map(issue => `${issue.path.join('.') || 'rate'} ${issue.message}`),
    );
  }
  return value;
}

export function rate(size: number, intervalMs: number): LimitedRate {
  const opts: LimitedRate = { kind: 'limited', intervalMs, size };
  assertRate(opts);
  return opts;
}

export function perSecond(n: number): LimitedRate {
  return rate(n, SECOND_MS);
}

export function perMinute(n: number): LimitedRate {
  return rate(n, MINUTE_MS);
}

/** n bytes per second. */
export function Bps(n: number): LimitedRate {
  return perSecond(Math.floor(n));
}

/** n kilobits per second. */
export function Kbps(n: number): LimitedRate {
  return perSecond(Math.floor(Kb * n));
}

/** n megabits per second. */
export function Mbps(n: number): LimitedRate {
  return perSecond(Math.floor(Mb * n));
}

/** n gigabits per second. */
export function Gbps(n: number): LimitedRate {
  return perSecond(Math.floor(Gb * n));
}

export function isUnlimited(opts: RateOpts): opts is UnlimitedRate {
  return opts.kind === 'unlimited';
}

const UNIT_RATES = new Map<string, (n: number) => LimitedRate>([
  ['', Bps],
  ['b/s', Bps],
  ['bps', Bps],
  ['kbps', Kbps],
  ['mbps', Mbps],
  ['gbps', Gbps],
]);

const INTERVAL_UNITS: Record<string, number> = {
  ms: 1,
  s: SECOND_MS,
  m: MINUTE_MS,
};

const UNIT_PATTERN = /^(\d+(?:\.\d+)?)\s*([a-z/]*)$/;
const FRACTION_PATTERN = /^(\d+)\s*\/\s*(\d+(?:\.\d+)?)?\s*(ms|s|m)$/;

/**
 * Parse a human rate: `unlimited`, `4096` or `4096B/s` (bytes per second),
 * `512Kbps`, `8Mbps`, `1Gbps`, or an explicit `<size>/<interval>` such as
 * `128/100ms`, `1000/s` or `60/5m`. Case-insensitive.
 */
export function parseRate(text: string): RateOpts {
  const input = text.trim().toLowerCase();
  if (input === 'unlimited') return UNLIMITED;

  const fraction = FRACTION_PATTERN.exec(input);
  if (fraction) {
    const [, size, count, unit] = fraction;
    const intervalMs = (count === undefined ? 1 : Number(count)) * INTERVAL_UNITS[unit];
    return rate(Number(size), intervalMs);
  }

  const match = UNIT_PATTERN.exec(input);
  const toRate = match ? UNIT_RATES.get(match[2]) : undefined;
  if (!match || !toRate) {
    throw new RateConfigError(`Unrecognized rate "${text}"`);
  }
  return toRate(Number(match[1]));
}

export function formatRate(opts: RateOpts): string {
  if (opts.kind === 'unlimited') return 'unlimited';
  return `${opts.size}B/${opts.intervalMs}ms`;
}
