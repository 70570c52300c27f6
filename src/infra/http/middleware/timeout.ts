import type { Request, Response, NextFunction } from 'express';
import { requestContext } from '../context.js';
import { MAX_TIMEOUT_MS } from '../../config.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`request exceeded ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Bound the request's lifetime. When `ms` elapses the context signal is
 * aborted and, unless the handler already started writing, the client gets a
 * 504. Handlers doing blocking work must watch `req.ctx.signal`.
 */
export function timeout(ms: number = DEFAULT_REQUEST_TIMEOUT_MS) {
  if (!Number.isInteger(ms) || ms < 1 || ms > MAX_TIMEOUT_MS) {
    throw new RangeError(`request timeout must be an integer between 1 and ${MAX_TIMEOUT_MS}ms, got ${ms}`);
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    const controller = new AbortController();
    req.ctx = requestContext(req).withSignal(controller.signal);

    const timer = setTimeout(() => {
      controller.abort(new RequestTimeoutError(ms));
      if (!res.headersSent) {
        res.status(504).type('text/plain').send('Gateway Timeout');
      }
    }, ms);
    const clear = () => clearTimeout(timer);
    res.on('finish', clear);
    res.on('close', clear);

    next();
  };
}
