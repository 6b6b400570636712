import type { IncomingMessage } from 'node:http';
import { normalizeIp } from '../monitoring/logger.js';

/**
 * Best-effort client address, in order of precedence:
 *
 * 1. the first entry of X-Forwarded-For,
 * 2. the socket's remote address,
 * 3. an empty string when neither is known (e.g. a destroyed socket).
 */
export function groupByRequestIp(req: IncomingMessage): string {
  const header = req.headers['x-forwarded-for'];
  const forwardedFor = Array.isArray(header) ? header[0] : header;
  if (forwardedFor) {
    const first = forwardedFor.split(',')[0].trim();
    if (first) return first;
  }

  const remote = req.socket?.remoteAddress;
  return remote ? normalizeIp(remote) : '';
}

/** Request path without its query string. */
export function groupByPath(req: IncomingMessage): string {
  const url = req.url ?? '/';
  const end = url.search(/[?#]/);
  return end === -1 ? url : url.slice(0, end);
}
