import type { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '../../../application/errors.js';

/**
 * Last stop for anything a handler throws. The request fails, the process
 * keeps serving.
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    // Too late for a clean response; let Express tear the connection down.
    req.log.error({ err }, 'error after response started');
    next(err);
    return;
  }

  if (err instanceof NotFoundError) {
    res.status(404).type('text/plain').send('Not Found');
    return;
  }

  req.log.error({ err }, 'unhandled error while serving request');
  res.status(500).type('text/plain').send('Internal Server Error');
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).type('text/plain').send('404 page not found');
}
