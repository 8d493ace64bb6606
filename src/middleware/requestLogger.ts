/**
 * Request logging keyed by the request id from `requestContext`.
 *
 * @module middleware/requestLogger
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../logging/logger.js';

export function requestLogger(logger: Logger, clock: () => number = Date.now): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = clock();
    const method = req.method;
    const url = req.originalUrl;
    const child = logger.child({ correlationId: req.requestId });

    child.debug('request started', { method, url });
    res.on('finish', () => {
      child.info('request completed', {
        method,
        url,
        statusCode: res.statusCode,
        durationMs: clock() - start,
        principalId: req.access?.principal.id ?? null,
      });
    });
    next();
  };
}
