import fs from 'node:fs';
import crypto from 'node:crypto';
import { RateFileSchema } from './schema.js';
import { formatRate, type RateOpts } from '../core/rate.js';
import { logger } from '../monitoring/logger.js';

interface RateWatcherOptions {
  filePath: string;
  onRate: (rate: RateOpts) => void;
  pollIntervalMs?: number;
}

const log = logger.child({ component: 'rate-watcher' });

/**
 * Polls a JSON file of the form `{ "rate": "512Kbps" }` and reports each
 * valid change. A file that cannot be read, parsed or validated is logged
 * and the current rate stays in force.
 */
export class RateWatcher {
  private readonly filePath: string;
  private readonly onRate: (rate: RateOpts) => void;
  private readonly pollIntervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastContentHash = '';

  constructor(options: RateWatcherOptions) {
    this.filePath = options.filePath;
    this.onRate = options.onRate;
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
  }

  /** Apply the file's current rate, then keep polling for changes. */
  start(): void {
    this.check(true);

    this.timer = setInterval(() => this.check(), this.pollIntervalMs);
    this.timer.unref();

    log.info({ filePath: this.filePath, pollIntervalMs: this.pollIntervalMs }, 'Rate watcher started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Re-read the file even if it looks unchanged. Returns true if a rate was applied. */
  forceReload(): boolean {
    return this.check(true);
  }

  /** Returns true if a rate was applied. */
  check(force = false): boolean {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      log.error({ filePath: this.filePath, error: String(err) }, 'Failed to read rate file (keeping current rate)');
      return false;
    }

    const contentHash = crypto.createHash('sha256').update(content).digest('hex');
    if (!force && contentHash === this.lastContentHash) {
      return false;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      log.error({ error: String(err) }, 'Rate file is not valid JSON (keeping current rate)');
      return false;
    }

    const result = RateFileSchema.safeParse(parsed);
    if (!result.success) {
      log.error({ errors: result.error.issues }, 'Rate file failed validation (keeping current rate)');
      return false;
    }

    this.lastContentHash = contentHash;
    this.onRate(result.data.rate);
    log.info({ rate: formatRate(result.data.rate) }, 'Rate file applied');
    return true;
  }
}
