import express from 'express';
import type { Logger } from 'pino';
import type { UserQueries } from '../../application/users/queries.js';
import { createUserRoutes } from './routes/users.js';
import { methodNotAllowed } from './middleware/methodNotAllowed.js';
import type { UserResponseFactory } from './render.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { makeHttpLogger } from './middleware/httpLogger.js';
import { requestContextMiddleware } from './middleware/requestContext.js';
import { timeout, DEFAULT_REQUEST_TIMEOUT_MS } from './middleware/timeout.js';
import { urlFormat } from './middleware/urlFormat.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';

export const BANNER = 'Express microservice template';

export interface AppOptions {
  queries: UserQueries;
  logger: Logger;
  requestTimeoutMs?: number;
  trustProxy?: boolean;
  userResponse?: UserResponseFactory;
}

export function createApp(options: AppOptions): express.Application {
  const app = express();
  // Client IP from X-Forwarded-For when running behind a proxy
  app.set('trust proxy', options.trustProxy ?? true);

  // Middleware (order matters: the logger assigns req.id, the context reads it)
  app.use(makeHttpLogger(options.logger));
  app.use(requestContextMiddleware);
  app.use(timeout(options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS));

  // Docs sit ahead of urlFormat, which would otherwise eat `.json`
  app.use(createSwaggerRoutes());

  app.use(urlFormat);

  app.get('/', (_req, res) => {
    res.type('text/plain').send(BANNER);
  });
  app.all('/', methodNotAllowed(['GET', 'HEAD']));

  app.use('/users', createUserRoutes(options.queries, { userResponse: options.userResponse }));

  app.use(notFoundHandler);
  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
