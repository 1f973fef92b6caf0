/**
 * Error handling middleware for the config API.
 * Route handlers are synchronous; Express forwards anything they throw here.
 */

import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ConfigError } from '../errors.js';

/**
 * HTTP status for an error raised while handling a request:
 * - NOT_FOUND (missing config or backup) and out-of-range indexes → 404
 * - VALIDATION → 400
 * - client errors raised by Express itself (e.g. malformed JSON body) keep their status
 * - everything else, undecodable config files included → 500
 */
export function statusFor(err: Error): number {
  if (err instanceof ConfigError) {
    if (err.code === 'NOT_FOUND') return 404;
    if (err.code === 'VALIDATION') return 400;
  }
  if (err instanceof RangeError) return 404;
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

/**
 * Global error handler, registered after every router.
 * Stack traces are only returned outside production.
 */
export function createErrorHandler(options: { production: boolean }): ErrorRequestHandler {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const status = statusFor(err);

    if (status >= 500) {
      console.error('[Global Error Handler]', {
        message: err.message,
        stack: err.stack,
        path: req.path,
        method: req.method,
        timestamp: new Date().toISOString()
      });
      res.status(status).json({
        error: 'Internal server error',
        message: options.production ? 'An unexpected error occurred' : err.message,
        ...(!options.production && { stack: err.stack })
      });
      return;
    }

    console.warn(`[Global Error Handler] ${req.method} ${req.path} -> ${status}: ${err.message}`);
    res.status(status).json({ error: err.message });
  };
}
