import type { Request, Response, NextFunction } from 'express';

/**
 * Pagination hook for list routes. Currently a pass-through: a real version
 * would read page/limit/cursor from the query string and put them on the
 * request context for the handler.
 */
export function paginate(_req: Request, _res: Response, next: NextFunction): void {
  next();
}
