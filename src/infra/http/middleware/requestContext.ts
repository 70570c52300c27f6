import type { Request, Response, NextFunction } from 'express';
import { RequestContext, requestIdKey } from '../context.js';

/**
 * Install the root context for this request. Must run after the HTTP logger
 * so `req.id` is populated.
 */
export function requestContextMiddleware(req: Request, _res: Response, next: NextFunction): void {
  req.ctx = RequestContext.background().withValue(requestIdKey, String(req.id));
  next();
}
