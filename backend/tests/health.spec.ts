import request from 'supertest';

import { setReady } from '../config/lifecycle.js';
import { buildTestApp } from './helpers/testApp.js';

describe('health', () => {
  afterEach(() => {
    setReady(false);
  });

  it('GET /api/health returns ok', async () => {
    const { app } = await buildTestApp();

    const res = await request(app).get('/api/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', database: { status: 'connected' } });
    expect(typeof res.body.timestamp).toBe('string');
    // supertest connects over loopback, which counts as a local caller.
    expect(res.body.pid).toBe(process.pid);
    expect(String(res.headers['x-request-id'])).toBeTruthy();
  });

  it('echoes X-Request-Id when provided', async () => {
    const { app } = await buildTestApp();

    const res = await request(app).get('/api/health').set('x-request-id', 'test-request-id-123');

    expect(res.status).toBe(200);
    expect(res.headers['x-request-id']).toBe('test-request-id-123');
  });

  it('replaces request ids that could inject into logs', async () => {
    const { app } = await buildTestApp();

    const res = await request(app).get('/api/health').set('x-request-id', 'bad id;with spaces');

    expect(res.headers['x-request-id']).not.toBe('bad id;with spaces');
    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('reports a degraded database', async () => {
    const { app, tickets } = await buildTestApp();
    tickets.healthy = false;

    const res = await request(app).get('/api/health');

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ status: 'degraded', database: { status: 'disconnected' } });
  });

  it('separates liveness from readiness', async () => {
    const { app } = await buildTestApp();

    const live = await request(app).get('/api/health/live');
    expect(live.status).toBe(200);
    expect(live.body).toEqual({ status: 'alive' });

    const starting = await request(app).get('/api/health/ready');
    expect(starting.status).toBe(503);
    expect(starting.body).toMatchObject({ status: 'not_ready', checks: { server: 'starting' } });

    setReady(true);
    const ready = await request(app).get('/api/health/ready');
    expect(ready.status).toBe(200);
    expect(ready.body).toEqual({ status: 'ready', checks: { server: 'up', database: 'connected' } });
  });

  it('answers unknown routes with NOT_FOUND', async () => {
    const { app } = await buildTestApp();

    const res = await request(app).get('/api/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found: GET /api/nope' } });
  });
});
