import type { Request, Response } from 'express';

/** Fallback for a known path hit with a method it does not serve. */
export function methodNotAllowed(allowed: readonly string[]) {
  const allow = allowed.join(', ');
  return (_req: Request, res: Response): void => {
    res.status(405).set('Allow', allow).type('text/plain').send('Method Not Allowed');
  };
}
