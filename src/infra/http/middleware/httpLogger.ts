import { randomUUID } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { pinoHttp } from 'pino-http';
import type { Logger } from 'pino';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Request logging plus request ids. An incoming `X-Request-Id` is reused,
 * otherwise a UUID is minted; either way it is echoed back to the caller.
 */
export function makeHttpLogger(logger: Logger) {
  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const header = req.headers[REQUEST_ID_HEADER];
      const id = (Array.isArray(header) ? header[0] : header) || randomUUID();
      res.setHeader(REQUEST_ID_HEADER, id);
      return id;
    },

    // 4xx are the caller's problem; keep them out of the error stream.
    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err) return 'error';
      if (res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },

    serializers: {
      req(req: { id: unknown; method: string; url: string; remoteAddress?: string }) {
        return { id: req.id, method: req.method, url: req.url, remoteAddress: req.remoteAddress };
      },
      res(res: { statusCode: number }) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
