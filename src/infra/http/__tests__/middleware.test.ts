import { describe, it, expect } from 'vitest';
import request from 'supertest';
import express from 'express';
import { pino } from 'pino';
import { makeHttpLogger } from '../middleware/httpLogger.js';
import { requestContextMiddleware } from '../middleware/requestContext.js';
import { timeout, RequestTimeoutError } from '../middleware/timeout.js';
import { urlFormat } from '../middleware/urlFormat.js';
import { paginate } from '../middleware/paginate.js';
import { errorHandler, notFoundHandler } from '../middleware/errorHandler.js';
import { NotFoundError } from '../../../application/errors.js';
import { requestContext, requestIdKey, urlFormatKey } from '../context.js';

const silentLogger = pino({ level: 'silent' });

function baseApp(): express.Application {
  const app = express();
  app.use(makeHttpLogger(silentLogger));
  app.use(requestContextMiddleware);
  return app;
}

describe('request ids', () => {
  it('reuses an incoming X-Request-Id and puts it on the context', async () => {
    const app = baseApp();
    app.get('/', (req, res) => {
      res.json({ requestId: requestContext(req).value(requestIdKey) });
    });

    const res = await request(app).get('/').set('X-Request-Id', 'req-123');

    expect(res.headers['x-request-id']).toBe('req-123');
    expect(res.body).toEqual({ requestId: 'req-123' });
  });

  it('mints a UUID when none is supplied', async () => {
    const app = baseApp();
    app.get('/', (req, res) => {
      res.json({ requestId: requestContext(req).value(requestIdKey) });
    });

    const res = await request(app).get('/');

    expect(res.headers['x-request-id']).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
    );
    expect(res.body.requestId).toBe(res.headers['x-request-id']);
  });
});

describe('timeout', () => {
  it('answers 504 and aborts the context signal when the handler stalls', async () => {
    let reason: unknown;
    const app = baseApp();
    app.use(timeout(20));
    app.get('/slow', (req) => {
      const { signal } = requestContext(req);
      signal.addEventListener('abort', () => {
        reason = signal.reason;
      });
    });

    const res = await request(app).get('/slow');

    expect(res.status).toBe(504);
    expect(res.text).toBe('Gateway Timeout');
    expect(reason).toBeInstanceOf(RequestTimeoutError);
  });

  it('lets a handler that answers in time through', async () => {
    const app = baseApp();
    app.use(timeout(1000));
    app.get('/later', (_req, res) => {
      setTimeout(() => res.type('text/plain').send('done'), 50);
    });

    const res = await request(app).get('/later');

    expect(res.status).toBe(200);
    expect(res.text).toBe('done');
  });

  it('refuses a delay setTimeout cannot honour', () => {
    expect(() => timeout(3_000_000_000)).toThrow(RangeError);
    expect(() => timeout(0)).toThrow(RangeError);
    expect(() => timeout(1.5)).toThrow(RangeError);
  });

  it('keeps earlier context values on the derived context', async () => {
    const app = baseApp();
    app.use(timeout(1000));
    app.get('/', (req, res) => {
      const ctx = requestContext(req);
      res.json({ requestId: ctx.value(requestIdKey), cancelled: ctx.cancelled });
    });

    const res = await request(app).get('/').set('X-Request-Id', 'req-9');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ requestId: 'req-9', cancelled: false });
  });
});

describe('urlFormat', () => {
  function formatApp(): express.Application {
    const app = baseApp();
    app.use(urlFormat);
    app.get('/things/:id', (req, res) => {
      res.json({
        id: req.params.id,
        format: requestContext(req).value(urlFormatKey) ?? null,
        query: req.query,
      });
    });
    return app;
  }

  it('strips the extension and records it', async () => {
    const res = await request(formatApp()).get('/things/abc.json?x=1');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: 'abc', format: 'json', query: { x: '1' } });
  });

  it('leaves paths without an extension alone', async () => {
    const res = await request(formatApp()).get('/things/abc');
    expect(res.body).toEqual({ id: 'abc', format: null, query: {} });
  });

  it('does not treat a leading dot as an extension', async () => {
    const res = await request(formatApp()).get('/things/.hidden');
    expect(res.body).toEqual({ id: '.hidden', format: null, query: {} });
  });
});

describe('paginate', () => {
  it('passes the request through untouched', async () => {
    const app = baseApp();
    app.get('/', paginate, (req, res) => {
      res.json({ query: req.query });
    });

    const res = await request(app).get('/?page=2&limit=5');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ query: { page: '2', limit: '5' } });
  });
});

describe('errorHandler', () => {
  function failingApp(error: unknown): express.Application {
    const app = baseApp();
    app.get('/boom', () => {
      throw error;
    });
    app.get('/ok', (_req, res) => {
      res.type('text/plain').send('ok');
    });
    app.use(notFoundHandler);
    app.use(errorHandler);
    return app;
  }

  it('turns a thrown error into a plain 500 and keeps serving', async () => {
    const app = failingApp(new Error('kaboom'));

    const failed = await request(app).get('/boom');
    expect(failed.status).toBe(500);
    expect(failed.text).toBe('Internal Server Error');
    expect(failed.headers['content-type']).toMatch(/^text\/plain/);

    const next = await request(app).get('/ok');
    expect(next.status).toBe(200);
    expect(next.text).toBe('ok');
  });

  it('maps NotFoundError to 404', async () => {
    const res = await request(failingApp(new NotFoundError())).get('/boom');

    expect(res.status).toBe(404);
    expect(res.text).toBe('Not Found');
  });

  it('answers unknown routes with a plain 404', async () => {
    const res = await request(failingApp(new Error('unused'))).get('/missing');

    expect(res.status).toBe(404);
    expect(res.text).toBe('404 page not found');
  });
});
