import type { IncomingMessage, ServerResponse } from 'node:http';
import { Bucket } from '../core/bucket.js';
import { Group } from '../core/group.js';
import { KeyedHandlerCache } from '../core/keyed-handler-cache.js';
import { assertRate, formatRate, type RateOpts } from '../core/rate.js';
import { groupByRequestIp } from '../http/classify.js';
import { groupHandler, limitResponse, type GroupRequestHandler } from '../http/limit-handler.js';
import type { RequestHandler } from '../http/types.js';
import { logger } from '../monitoring/logger.js';
import { httpRequests } from '../monitoring/metrics.js';

export type ThrottleMode = 'request' | 'global' | 'ip';

export interface ThrottlePolicyOptions {
  mode: ThrottleMode;
  rate: RateOpts;
  /** Idle time before a client's group is dropped in `ip` mode. */
  reapDelayMs: number;
}

const log = logger.child({ component: 'throttle-policy' });

/**
 * Applies one of three throttling layouts to a handler and keeps them all
 * in step when the rate changes at runtime:
 *
 * - `request`: every response has its own bucket
 * - `global`: all responses share one group
 * - `ip`: each client address shares a group, reaped when idle
 */
export class ThrottlePolicy {
  readonly mode: ThrottleMode;
  readonly handler: RequestHandler;
  private current: RateOpts;
  private readonly global: Group | null = null;
  private readonly clients: KeyedHandlerCache<GroupRequestHandler> | null = null;

  constructor(inner: RequestHandler, options: ThrottlePolicyOptions) {
    this.mode = options.mode;
    this.current = assertRate(options.rate);

    let limited: RequestHandler;
    switch (options.mode) {
      case 'request':
        limited = (req, res) => inner(req, limitResponse(res, new Bucket(this.current)));
        break;
      case 'global':
        this.global = new Group(this.current);
        limited = groupHandler(inner, this.global);
        break;
      case 'ip':
        this.clients = new KeyedHandlerCache({
          classify: groupByRequestIp,
          factory: () => groupHandler(inner, new Group(this.current)),
          expiryMs: options.reapDelayMs,
          name: 'client-ip',
        });
        limited = this.clients.dispatch;
        break;
    }

    this.handler = (req: IncomingMessage, res: ServerResponse) => {
      res.once('finish', () => httpRequests.inc({ mode: this.mode, status: String(res.statusCode) }));
      limited(req, res);
    };
  }

  get rate(): RateOpts {
    return this.current;
  }

  /** Client groups currently cached; always 0 outside `ip` mode. */
  get activeKeys(): number {
    return this.clients?.size ?? 0;
  }

  /**
   * Change the rate for everything this policy governs. Shared groups pick
   * it up mid-transfer; per-request buckets already in flight keep the rate
   * they started with.
   */
  setRate(rate: RateOpts): void {
    this.current = assertRate(rate);
    this.global?.setRate(rate);
    this.clients?.forEach((handler) => handler.group.setRate(rate));
    log.info({ mode: this.mode, rate: formatRate(rate), clients: this.activeKeys }, 'Rate updated');
  }

  close(): void {
    this.clients?.close();
  }
}
