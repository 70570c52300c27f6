import type { Request, Response, NextFunction } from 'express';
import type { UserQueries } from '../../../application/users/queries.js';
import { NotFoundError } from '../../../application/errors.js';
import { requestContext, userKey } from '../context.js';

/**
 * Resolve `:userID` into a User and hand it to the rest of the chain through
 * the request context. Unknown ids end the chain with a plain-text 404.
 */
export function userCtx(queries: UserQueries) {
  return (req: Request<{ userID: string }>, res: Response, next: NextFunction): void => {
    try {
      const user = queries.getUser(req.params.userID);
      req.ctx = requestContext(req).withValue(userKey, user);
    } catch (error) {
      if (error instanceof NotFoundError) {
        res.status(404).type('text/plain').send('Not Found');
        return;
      }
      next(error);
      return;
    }
    next();
  };
}
