import type { IncomingMessage, ServerResponse } from 'node:http';
import { Writable, pipeline } from 'node:stream';
import { Bucket } from '../core/bucket.js';
import { Group } from '../core/group.js';
import { KeyedHandlerCache } from '../core/keyed-handler-cache.js';
import { assertRate, type RateOpts } from '../core/rate.js';
import { ThrottleStream } from '../stream/throttle-stream.js';
import { logger } from '../monitoring/logger.js';
import { groupByRequestIp } from './classify.js';
import type { RequestHandler } from './types.js';

type WriteCallback = (error: Error | null | undefined) => void;
type ResponseChunk = string | Buffer | Uint8Array;

// The first overloads of OutgoingMessage#write and #end, taken before they are replaced.
type RawWrite = (this: ServerResponse, chunk: Buffer, callback: WriteCallback) => boolean;
type RawEnd = (this: ServerResponse, callback?: () => void) => ServerResponse;

/** A handler whose requests all draw from one group. */
export type GroupRequestHandler = RequestHandler & { readonly group: Group };

export const DEFAULT_REAP_DELAY_MS = 60 * 60 * 1000;

/**
 * Route everything written to `res` through `bucket`. Write order,
 * backpressure and end callbacks behave as on a plain response; the bytes
 * simply leave no faster than the bucket allows. A client that disconnects
 * mid-body cancels any pending wait.
 */
export function limitResponse(res: ServerResponse, bucket: Bucket): ServerResponse {
  const rawWrite: RawWrite = res.write;
  const rawEnd: RawEnd = res.end;
  const throttle = new ThrottleStream({ bucket });

  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      rawWrite.call(res, chunk, callback);
    },
    final(callback) {
      rawEnd.call(res, () => callback());
    },
  });

  pipeline(throttle, sink, (err) => {
    if (err && !res.destroyed) {
      logger.warn({ err }, 'Throttled response failed');
      res.destroy(err);
    }
  });

  throttle.on('drain', () => res.emit('drain'));
  res.once('close', () => {
    if (!res.writableFinished) throttle.destroy();
  });

  res.write = (chunk: ResponseChunk, encodingOrCallback?: BufferEncoding | WriteCallback, callback?: WriteCallback): boolean => {
    if (typeof encodingOrCallback === 'function') {
      return throttle.write(chunk, encodingOrCallback);
    }
    return throttle.write(chunk, encodingOrCallback ?? 'utf8', callback);
  };

  res.end = (chunk?: ResponseChunk | (() => void), encodingOrCallback?: BufferEncoding | (() => void), callback?: () => void): ServerResponse => {
    let done = callback;
    let encoding: BufferEncoding = 'utf8';
    if (typeof encodingOrCallback === 'function') {
      done = encodingOrCallback;
    } else if (encodingOrCallback) {
      encoding = encodingOrCallback;
    }

    if (typeof chunk === 'function') {
      done = chunk;
      throttle.end();
    } else if (chunk === undefined || chunk === null) {
      throttle.end();
    } else {
      throttle.end(chunk, encoding);
    }

    if (done) res.once('finish', done);
    return res;
  };

  return res;
}

/** Limit each response of `handler` to `rate` on its own. */
export function limitHandler(handler: RequestHandler, rate: RateOpts): RequestHandler {
  assertRate(rate);
  return (req, res) => handler(req, limitResponse(res, new Bucket(rate)));
}

/** All responses of `handler` share the quota of `group`. */
export function groupHandler(handler: RequestHandler, group: Group): GroupRequestHandler {
  return Object.assign(
    (req: IncomingMessage, res: ServerResponse) => handler(req, limitResponse(res, group.bucket)),
    { group },
  );
}

/**
 * Limit `handler` to `rate` per client IP. Each address gets its own group,
 * dropped after `expiryMs` without requests.
 */
export function limitByRequestIp(
  handler: RequestHandler,
  rate: RateOpts,
  expiryMs = DEFAULT_REAP_DELAY_MS,
): KeyedHandlerCache<GroupRequestHandler> {
  assertRate(rate);
  return new KeyedHandlerCache({
    classify: groupByRequestIp,
    factory: () => groupHandler(handler, new Group(rate)),
    expiryMs,
    name: 'request-ip',
  });
}
