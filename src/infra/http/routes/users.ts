import { Router, type Request, type Response } from 'express';
import type { UserQueries } from '../../../application/users/queries.js';
import { requestContext, userKey } from '../context.js';
import { paginate } from '../middleware/paginate.js';
import { userCtx } from '../middleware/userCtx.js';
import { methodNotAllowed } from '../middleware/methodNotAllowed.js';
import {
  errRender,
  newUserListResponse,
  newUserResponse,
  render,
  renderList,
  type UserResponseFactory,
} from '../render.js';

/**
 * @openapi
 * /users/:
 *   get:
 *     tags: [Users]
 *     summary: List every user
 *     responses:
 *       200:
 *         description: All users, in no particular order
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/User' }
 *       422:
 *         description: Response could not be rendered
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrResponse' }
 *
 * /users/{userID}/:
 *   get:
 *     tags: [Users]
 *     summary: Get a user by id
 *     parameters:
 *       - in: path
 *         name: userID
 *         required: true
 *         schema: { type: string, example: fece }
 *     responses:
 *       200:
 *         description: The user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: No user with that id
 *         content:
 *           text/plain:
 *             schema: { type: string, example: Not Found }
 *       422:
 *         description: Response could not be rendered
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrResponse' }
 */

export interface UserRoutesOptions {
  /** Wraps each user for the wire; defaults to `UserResponse`. */
  userResponse?: UserResponseFactory;
}

export function createUserRoutes(queries: UserQueries, options: UserRoutesOptions = {}) {
  const toResponse = options.userResponse ?? newUserResponse;
  const router = Router();

  router.get('/', paginate, (req: Request, res: Response) => {
    const list = newUserListResponse(queries.listUsers(), toResponse);
    try {
      renderList(req, res, list);
    } catch (error) {
      render(req, res, errRender(error));
    }
  });
  router.all('/', methodNotAllowed(['GET', 'HEAD']));

  // Everything under /:userID sees the resolved user on its context.
  const userRouter = Router({ mergeParams: true });
  userRouter.use(userCtx(queries));
  userRouter.get('/', (req: Request, res: Response) => {
    const user = requestContext(req).mustValue(userKey);
    try {
      render(req, res, toResponse(user));
    } catch (error) {
      render(req, res, errRender(error));
    }
  });
  userRouter.all('/', methodNotAllowed(['GET', 'HEAD']));
  router.use('/:userID', userRouter);

  return router;
}
