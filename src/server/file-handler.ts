import fs from 'node:fs';
import path from 'node:path';
import type { ServerResponse } from 'node:http';
import type { RequestHandler } from '../http/types.js';
import { groupByPath } from '../http/classify.js';
import { logger } from '../monitoring/logger.js';

const log = logger.child({ component: 'file-handler' });

/** Serve regular files below `root` for GET and HEAD. */
export function serveFiles(root: string): RequestHandler {
  const base = path.resolve(root);

  return (req, res) => {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      reply(res, 405, 'Method not allowed', { Allow: 'GET, HEAD' });
      return;
    }

    let relative: string;
    try {
      relative = decodeURIComponent(groupByPath(req));
    } catch {
      reply(res, 400, 'Bad request');
      return;
    }
    if (relative.includes('\0')) {
      reply(res, 400, 'Bad request');
      return;
    }

    // Normalizing against `/` strips any `..` that would climb out of `base`.
    const target = path.resolve(base, `.${path.posix.normalize(`/${relative}`)}`);

    fs.stat(target, (err, stats) => {
      if (err || !stats.isFile()) {
        reply(res, 404, 'Not found');
        return;
      }

      const headers = {
        'Content-Type': 'application/octet-stream',
        'Content-Length': stats.size,
      };
      if (req.method === 'HEAD') {
        res.writeHead(200, headers);
        res.end();
        return;
      }

      // Headers wait for the open so a failed open can still answer 500.
      const file = fs.createReadStream(target);
      file.once('error', (readErr) => {
        log.error({ err: readErr, file: target }, 'Failed to read file');
        if (res.headersSent) {
          res.destroy(readErr);
        } else {
          reply(res, 500, 'Internal server error');
        }
      });
      file.once('open', () => {
        res.writeHead(200, headers);
        file.pipe(res);
      });
      res.once('close', () => file.destroy());
    });
  };
}

function reply(res: ServerResponse, status: number, message: string, headers: Record<string, string> = {}): void {
  res.writeHead(status, { ...headers, 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(message);
}
