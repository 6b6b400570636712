import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import { KeyedHandlerCache } from '../../src/core/keyed-handler-cache.js';
import type { RequestHandler } from '../../src/http/types.js';

interface CountingHandler extends RequestHandler {
  key: string;
  calls: number;
}

function countingFactory() {
  return vi.fn((key: string): CountingHandler => {
    const handler: CountingHandler = Object.assign(
      () => {
        handler.calls++;
      },
      { key, calls: 0 },
    );
    return handler;
  });
}

function request(url: string): { req: IncomingMessage; res: ServerResponse } {
  const req = new IncomingMessage(new Socket());
  req.url = url;
  return { req, res: new ServerResponse(req) };
}

const byPath = (req: IncomingMessage) => req.url ?? '';

describe('KeyedHandlerCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('routes requests to one handler per key', () => {
    const factory = countingFactory();
    const cache = new KeyedHandlerCache({ classify: byPath, factory, expiryMs: 1000 });

    const foo = request('/foo');
    const bar = request('/bar');
    cache.dispatch(foo.req, foo.res);
    cache.dispatch(bar.req, bar.res);
    cache.dispatch(foo.req, foo.res);

    expect(factory).toHaveBeenCalledTimes(2);
    expect(factory).toHaveBeenNthCalledWith(1, '/foo');
    expect(factory).toHaveBeenNthCalledWith(2, '/bar');

    const fooHandler = cache.resolve('/foo');
    const barHandler = cache.resolve('/bar');
    expect(fooHandler).not.toBe(barHandler);
    expect(fooHandler.calls).toBe(2);
    expect(barHandler.calls).toBe(1);
    cache.close();
  });

  it('passes the request and response through to the handler', () => {
    const inner = vi.fn();
    const cache = new KeyedHandlerCache({ classify: () => 'all', factory: () => inner, expiryMs: 0 });
    const { req, res } = request('/x');

    cache.dispatch(req, res);

    expect(inner).toHaveBeenCalledWith(req, res);
  });

  it('evicts a key that sits idle past the expiry', async () => {
    const factory = countingFactory();
    const cache = new KeyedHandlerCache({ classify: byPath, factory, expiryMs: 100 });

    const first = cache.resolve('bar');
    await vi.advanceTimersByTimeAsync(99);
    expect(cache.has('bar')).toBe(true);

    await vi.advanceTimersByTimeAsync(1);
    expect(cache.has('bar')).toBe(false);
    expect(cache.size).toBe(0);

    const second = cache.resolve('bar');
    expect(second).not.toBe(first);
    expect(factory).toHaveBeenCalledTimes(2);
    cache.close();
  });

  it('restarts the countdown on every lookup', async () => {
    const factory = countingFactory();
    const cache = new KeyedHandlerCache({ classify: byPath, factory, expiryMs: 100 });

    const foo = cache.resolve('foo');
    cache.resolve('bar');

    await vi.advanceTimersByTimeAsync(50);
    expect(cache.resolve('foo')).toBe(foo);

    await vi.advanceTimersByTimeAsync(60);
    expect(cache.has('foo')).toBe(true);
    expect(cache.has('bar')).toBe(false);
    expect(cache.resolve('foo')).toBe(foo);
    expect(factory).toHaveBeenCalledTimes(2);
    cache.close();
  });

  it('keeps handlers forever with an expiry of 0', async () => {
    const factory = countingFactory();
    const cache = new KeyedHandlerCache({ classify: byPath, factory, expiryMs: 0 });

    const foo = cache.resolve('foo');
    expect(vi.getTimerCount()).toBe(0);

    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);
    expect(cache.resolve('foo')).toBe(foo);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('keeps one timer per key', () => {
    const cache = new KeyedHandlerCache({ classify: byPath, factory: countingFactory(), expiryMs: 100 });

    cache.resolve('a');
    cache.resolve('b');
    cache.resolve('a');
    expect(vi.getTimerCount()).toBe(2);
    cache.close();
  });

  it('visits every cached handler', () => {
    const cache = new KeyedHandlerCache({ classify: byPath, factory: countingFactory(), expiryMs: 100 });
    cache.resolve('a');
    cache.resolve('b');

    const seen: string[] = [];
    cache.forEach((handler, key) => seen.push(`${key}=${handler.key}`));

    expect(seen).toEqual(['a=a', 'b=b']);
    cache.close();
  });

  it('cancels timers and forgets handlers on close', () => {
    const cache = new KeyedHandlerCache({ classify: byPath, factory: countingFactory(), expiryMs: 100 });
    cache.resolve('a');
    cache.resolve('b');

    cache.close();

    expect(cache.size).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects a negative or fractional expiry', () => {
    const factory = countingFactory();
    expect(() => new KeyedHandlerCache({ classify: byPath, factory, expiryMs: -1 })).toThrow(RangeError);
    expect(() => new KeyedHandlerCache({ classify: byPath, factory, expiryMs: 1.5 })).toThrow(RangeError);
  });

  it('rejects an expiry longer than a timer can wait', () => {
    const factory = countingFactory();
    expect(() => new KeyedHandlerCache({ classify: byPath, factory, expiryMs: 30 * 24 * 3600 * 1000 })).toThrow(RangeError);
  });

  it('holds a key for the longest accepted expiry', async () => {
    const cache = new KeyedHandlerCache({ classify: byPath, factory: countingFactory(), expiryMs: 2_147_483_647 });
    cache.resolve('k');

    await vi.advanceTimersByTimeAsync(5);
    expect(cache.has('k')).toBe(true);

    await vi.advanceTimersByTimeAsync(2_147_483_642);
    expect(cache.has('k')).toBe(false);
  });
});
