import request from 'supertest';

import { createApp } from '../app.js';
import { seedAdmin } from '../seeds/admin.js';
import { WebhookDispatcher } from '../services/webhookDispatcher.js';
import { MemoryMemberStore, MemoryTicketStore } from './helpers/memoryStores.js';
import { testEnv } from './helpers/testApp.js';

describe('admin seeding', () => {
  const seededEnv = () =>
    testEnv({ SEED_ADMIN_EMAIL: 'Root@Helpdesk.test', SEED_ADMIN_PASSWORD: 'test-password', SEED_ADMIN_NAME: 'Root Admin' });

  it('seeds the admin once and allows email/password login', async () => {
    const env = seededEnv();
    const members = new MemoryMemberStore();

    const first = await seedAdmin(env, members, 4);
    const second = await seedAdmin(env, members, 4);

    expect(first).toMatchObject({ created: true, member: { email: 'root@helpdesk.test', role: 'admin', name: 'Root Admin' } });
    expect(second).toMatchObject({ created: false });
    expect(members.members.size).toBe(1);

    const app = createApp(env, { tickets: new MemoryTicketStore(), members, dispatcher: new WebhookDispatcher() });
    const loginRes = await request(app)
      .post('/api/auth/login')
      .send({ email: 'root@helpdesk.test', password: 'test-password' });

    expect(loginRes.status).toBe(200);
    expect(loginRes.body.member).toMatchObject({ role: 'admin' });
  });

  it('does nothing when no seed credentials are configured', async () => {
    const members = new MemoryMemberStore();

    await expect(seedAdmin(testEnv(), members)).resolves.toEqual({ skipped: true });
    expect(members.members.size).toBe(0);
  });

  it('refuses an email without a password', () => {
    expect(() => testEnv({ SEED_ADMIN_EMAIL: 'root@helpdesk.test' })).toThrow(/SEED_ADMIN_EMAIL/);
  });
});
