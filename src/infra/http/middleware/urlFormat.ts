import type { Request, Response, NextFunction } from 'express';
import { requestContext, urlFormatKey } from '../context.js';

/**
 * Strip a format extension from the last path segment (`/users/fece.json`
 * routes as `/users/fece`) and record it under `urlFormatKey`.
 */
export function urlFormat(req: Request, _res: Response, next: NextFunction): void {
  const queryStart = req.url.indexOf('?');
  const pathname = queryStart === -1 ? req.url : req.url.slice(0, queryStart);
  const query = queryStart === -1 ? '' : req.url.slice(queryStart);

  const base = pathname.lastIndexOf('/');
  const dot = pathname.lastIndexOf('.');
  // a leading dot (`/.well-known`, `/users/.x`) is part of the name
  if (dot > base + 1) {
    req.ctx = requestContext(req).withValue(urlFormatKey, pathname.slice(dot + 1));
    req.url = pathname.slice(0, dot) + query;
  }
  next();
}
