import express from 'express';
import request from 'supertest';

import { errorHandler } from '../middleware/errors.js';
import { DuplicateThreadError } from '../database/ticketStore.js';

describe('error handler production behavior', () => {
  const originalNodeEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalNodeEnv;
  });

  it('does not leak exception messages in production', async () => {
    process.env.NODE_ENV = 'production';

    const app = express();
    app.get('/boom', () => {
      throw new Error('secret details');
    });
    app.use(errorHandler);

    const res = await request(app).get('/boom').set('x-request-id', 'req-123');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'Something went wrong. Please try again later.',
        requestId: 'req-123',
      },
    });
  });

  it('includes exception messages in non-production for debugging', async () => {
    process.env.NODE_ENV = 'test';

    const app = express();
    app.get('/boom', () => {
      throw new Error('debug details');
    });
    app.use(errorHandler);

    const res = await request(app).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body).toMatchObject({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'debug details',
      },
    });
  });

  it('maps thread conflicts to 409', async () => {
    const app = express();
    app.get('/dup', () => {
      throw new DuplicateThreadError('thread-1');
    });
    app.use(errorHandler);

    const res = await request(app).get('/dup');

    expect(res.status).toBe(409);
    expect(res.body).toEqual({
      error: { code: 'DUPLICATE_THREAD', message: 'A ticket already exists for thread thread-1' },
    });
  });

  it('answers 503 for downstream network failures', async () => {
    const app = express();
    app.get('/down', () => {
      throw Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    });
    app.use(errorHandler);

    const res = await request(app).get('/down');

    expect(res.status).toBe(503);
    expect(res.headers['retry-after']).toBe('10');
    expect(res.body).toMatchObject({ error: { code: 'SERVICE_UNAVAILABLE' } });
  });
});
