import type { ErrorRequestHandler, RequestHandler } from 'express';
import { debugHttp, debugServer } from '../utils/debug.js';

/** Log every response once it has been sent. */
export function accessLog(): RequestHandler {
  return (req, res, next) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const ms = Number(process.hrtime.bigint() - start) / 1e6;
      debugHttp('%s %s %d %sms', req.method, req.originalUrl, res.statusCode, ms.toFixed(1));
    });
    next();
  };
}

export function notFound(): RequestHandler {
  return (_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  };
}

/**
 * Last handler of the chain: a handler that threw or rejected is logged with its
 * stack and answered with 500. The listener keeps serving.
 */
export function recovery(): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    const stack = err instanceof Error ? (err.stack ?? err.message) : String(err);
    debugServer('unhandled error while serving %s %s: %s', req.method, req.originalUrl, stack);
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json({ error: 'Internal Server Error' });
  };
}
