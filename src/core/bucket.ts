import { assertRate, type RateOpts } from './rate.js';
import { sleep } from '../utils/sleep.js';

export interface AcquireOptions {
  /** Aborting rejects a pending acquire or drain with the signal's reason. */
  signal?: AbortSignal;
}

/**
 * Fixed-interval token bucket.
 *
 * Callers take tokens with `acquire`; the whole capacity comes back in one
 * lump when an interval boundary passes. Refill is computed when somebody
 * asks for tokens, so there is no background timer and nothing to stop.
 *
 * Every read-modify-write of the counters below happens inside one
 * synchronous section. A caller that waited for a boundary re-reads the
 * state when it wakes, so losing the race to another waiter just means
 * another pass through the loop.
 */
export class Bucket {
  private opts: RateOpts;
  private used = 0;
  // performance.now() of the last drain; null until the first.
  private drainedAt: number | null = null;

  constructor(rate: RateOpts) {
    this.opts = assertRate(rate);
  }

  get rate(): RateOpts {
    return this.opts;
  }

  /** Tokens handed out since the last drain. */
  get consumed(): number {
    return this.used;
  }

  /** `performance.now()` of the last drain, 0 before the first one. */
  get lastDrainAt(): number {
    return this.drainedAt ?? 0;
  }

  /**
   * Take up to `n` tokens. Resolves with the number granted, which is
   * between 1 and `n` for any `n > 0`; waits for the next boundary when
   * the bucket is full.
   */
  async acquire(n: number, options: AcquireOptions = {}): Promise<number> {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new RangeError(`Token count must be a non-negative integer, got ${n}`);
    }
    if (n === 0) return 0;

    this.drainIfDue();

    for (;;) {
      options.signal?.throwIfAborted();

      const opts = this.opts;
      if (opts.kind === 'unlimited') return n;

      if (this.used >= opts.size) {
        await this.drain(true, options);
        continue;
      }

      const granted = Math.min(n, opts.size - this.used);
      this.used += granted;
      return granted;
    }
  }

  /**
   * Reset the bucket if an interval has passed since the last drain.
   * With `wait`, a bucket that is not yet due is drained after sleeping
   * until its boundary, unless another caller got there first. Resolves
   * with whether this call reset the counter.
   */
  async drain(wait: boolean, options: AcquireOptions = {}): Promise<boolean> {
    if (this.drainIfDue()) return true;

    const opts = this.opts;
    if (!wait || opts.kind === 'unlimited' || this.drainedAt === null) return false;

    await sleep(this.drainedAt + opts.intervalMs - performance.now(), options.signal);
    return this.drainIfDue();
  }

  /**
   * Swap the rate in place. Tokens already handed out this interval stay
   * counted, capped at the new size.
   */
  setRate(rate: RateOpts): void {
    this.opts = assertRate(rate);
    if (rate.kind === 'limited' && this.used > rate.size) {
      this.used = rate.size;
    }
  }

  private drainIfDue(): boolean {
    const opts = this.opts;
    if (opts.kind === 'unlimited') return false;

    const now = performance.now();
    if (this.drainedAt !== null && now - this.drainedAt < opts.intervalMs) return false;

    this.used = 0;
    this.drainedAt = now;
    return true;
  }
}
