import { describe, expect, it } from 'vitest';
import request from 'supertest';

import { isOriginAllowed } from '../app.js';
import { parseCorsOrigins } from '../config/env.js';
import { buildTestApp } from './helpers/testApp.js';

describe('CORS origin enforcement', () => {
  it('rejects requests with a disallowed Origin header', async () => {
    const { app } = await buildTestApp({ env: { CORS_ORIGINS: 'https://allowed.example' } });

    const res = await request(app).get('/api/health').set('Origin', 'https://evil.example');

    expect(res.status).toBe(403);
    expect(res.body).toEqual({ error: { code: 'ORIGIN_NOT_ALLOWED', message: 'Origin not allowed' } });
  });

  it('allows requests with an allowed Origin header', async () => {
    const { app } = await buildTestApp({ env: { CORS_ORIGINS: 'https://allowed.example' } });

    const res = await request(app).get('/api/health').set('Origin', 'https://allowed.example');

    expect(res.status).toBe(200);
    expect(res.headers['access-control-allow-origin']).toBe('https://allowed.example');
    expect(res.body).toMatchObject({ status: 'ok' });
  });

  it('normalizes entries with trailing slashes/paths/quotes', async () => {
    const { app } = await buildTestApp({
      env: { CORS_ORIGINS: '"https://allowed.example/",https://allowed.example/api' },
    });

    const res = await request(app).get('/api/health').set('Origin', 'https://allowed.example');

    expect(res.status).toBe(200);
    expect(parseCorsOrigins('"https://allowed.example/",https://allowed.example/api')).toEqual([
      'https://allowed.example',
      'https://allowed.example',
    ]);
  });

  it('matches wildcard, suffix and hostname entries', () => {
    expect(isOriginAllowed('https://app.example.com', ['*.example.com'])).toBe(true);
    expect(isOriginAllowed('https://app.example.com', ['.example.com'])).toBe(true);
    expect(isOriginAllowed('https://example.com', ['example.com'])).toBe(true);
    expect(isOriginAllowed('https://example.org', ['example.com'])).toBe(false);
    expect(isOriginAllowed('not a url', ['example.com'])).toBe(false);
    expect(isOriginAllowed('https://anything.test', [])).toBe(true);
  });
});
