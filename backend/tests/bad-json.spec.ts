import { describe, expect, it } from 'vitest';
import request from 'supertest';

import { buildTestApp } from './helpers/testApp.js';

describe('malformed JSON handling', () => {
  it('returns 400 BAD_JSON for malformed JSON bodies', async () => {
    const { app } = await buildTestApp();

    const res = await request(app)
      .post('/api/auth/login')
      .set('content-type', 'application/json')
      .send('{"email":"dana@helpdesk.test",');

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: {
        code: 'BAD_JSON',
      },
    });
    expect(String(res.headers['x-request-id'])).toBeTruthy();
    expect(res.body.error.requestId).toBe(res.headers['x-request-id']);
  });

  it('blocks path traversal in ticket bodies', async () => {
    const { app, addMember } = await buildTestApp();
    const { token } = await addMember('agent', 'dana@helpdesk.test');

    const res = await request(app)
      .post('/api/tickets')
      .set('Authorization', `Bearer ${token}`)
      .send({ subject: 'Files', body: 'open ../../etc/passwd' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: { code: 'BAD_REQUEST', message: 'The request contains invalid characters.' } });
  });
});
