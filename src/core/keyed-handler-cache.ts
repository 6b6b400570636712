import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Logger } from 'pino';
import type { RequestClassifier, RequestHandler } from '../http/types.js';
import { logger } from '../monitoring/logger.js';
import { keyedHandlerEvictions, keyedHandlers } from '../monitoring/metrics.js';
import { MAX_DELAY_MS } from '../utils/sleep.js';

export type HandlerFactory<H extends RequestHandler> = (key: string) => H;

export interface KeyedHandlerCacheOptions<H extends RequestHandler> {
  classify: RequestClassifier;
  factory: HandlerFactory<H>;
  /**
   * Idle time before a key's handler is dropped. Every request for the key
   * restarts the countdown. 0 keeps handlers forever, which only suits
   * low-cardinality keys such as the request path.
   */
  expiryMs: number;
  /** Label for logs and metrics. */
  name?: string;
}

/**
 * Routes each request to a handler built lazily for its classification
 * key, e.g. one rate-limited handler per client IP.
 */
export class KeyedHandlerCache<H extends RequestHandler = RequestHandler> {
  private readonly classify: RequestClassifier;
  private readonly factory: HandlerFactory<H>;
  private readonly expiryMs: number;
  private readonly name: string;
  private readonly handlers = new Map<string, H>();
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly log: Logger;

  constructor(options: KeyedHandlerCacheOptions<H>) {
    if (!Number.isInteger(options.expiryMs) || options.expiryMs < 0 || options.expiryMs > MAX_DELAY_MS) {
      throw new RangeError(`expiryMs must be an integer between 0 and ${MAX_DELAY_MS}, got ${options.expiryMs}`);
    }
    this.classify = options.classify;
    this.factory = options.factory;
    this.expiryMs = options.expiryMs;
    this.name = options.name ?? 'default';
    this.log = logger.child({ component: 'keyed-handler-cache', cache: this.name });
  }

  /** Request listener; safe to hand straight to `http.createServer`. */
  readonly dispatch = (req: IncomingMessage, res: ServerResponse): void => {
    const handler = this.resolve(this.classify(req));
    handler(req, res);
  };

  /** Look up the handler for `key`, building it on first use, and restart its expiry. */
  resolve(key: string): H {
    const existing = this.handlers.get(key);
    if (existing) {
      this.touch(key);
      return existing;
    }

    const handler = this.factory(key);
    this.handlers.set(key, handler);
    if (this.expiryMs !== 0) {
      this.timers.set(key, this.schedule(key));
    }
    keyedHandlers.inc({ cache: this.name });
    this.log.debug({ key }, 'Created handler');
    return handler;
  }

  has(key: string): boolean {
    return this.handlers.has(key);
  }

  get size(): number {
    return this.handlers.size;
  }

  forEach(fn: (handler: H, key: string) => void): void {
    this.handlers.forEach(fn);
  }

  /** Cancel all expiry timers and forget every handler. */
  close(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    keyedHandlers.dec({ cache: this.name }, this.handlers.size);
    this.handlers.clear();
  }

  private touch(key: string): void {
    const timer = this.timers.get(key);
    if (!timer) return;
    clearTimeout(timer);
    this.timers.set(key, this.schedule(key));
  }

  private schedule(key: string): ReturnType<typeof setTimeout> {
    const timer = setTimeout(() => this.reap(key), this.expiryMs);
    timer.unref();
    return timer;
  }

  private reap(key: string): void {
    const timer = this.timers.get(key);
    if (timer) clearTimeout(timer);
    this.timers.delete(key);
    if (this.handlers.delete(key)) {
      keyedHandlers.dec({ cache: this.name });
      keyedHandlerEvictions.inc({ cache: this.name });
      this.log.debug({ key }, 'Evicted idle handler');
    }
  }
}
