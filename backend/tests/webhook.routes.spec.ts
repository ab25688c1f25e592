import request from 'supertest';

import { TEST_WEBHOOK_URL, buildTestApp } from './helpers/testApp.js';

describe('webhook routes', () => {
  describe('tech director referral', () => {
    it('marks the ticket referred and posts the pre-referral snapshot', async () => {
      const { app, tickets, dispatcher, webhook, addMember } = await buildTestApp();
      const { member, token } = await addMember('agent', 'dana@helpdesk.test');
      await tickets.insertTicket({ ticketCode: 'AB1234', status: 'Open', priority: 'High', creationMethod: 'webhook' });

      const res = await request(app).post('/api/webhook/tech-director/ab1234').set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        message: 'Ticket referred to Technical Director',
        ticketId: 'AB1234',
        webhook: { status: 'pending', attempts: 0, method: 'referral' },
      });
      expect(await tickets.findTicketByCode('AB1234')).toMatchObject({
        status: 'Referred to Tech Director',
        referredBy: member.id,
      });

      await dispatcher.drain();
      expect(webhook.calls).toHaveLength(1);
      expect(webhook.calls[0]).toMatchObject({
        url: TEST_WEBHOOK_URL,
        body: {
          ticket_id: 'AB1234',
          assignment_method: 'referral',
          referred_by: 'agent tester',
          ticket_data: { status: 'Open', priority: 'High' },
        },
      });

      const status = await request(app).get('/api/webhook/status/AB1234').set('Authorization', `Bearer ${token}`);
      expect(status.body).toMatchObject({
        success: true,
        ticketId: 'AB1234',
        webhook: { status: 'success', attempts: 1, method: 'referral' },
      });
    });

    it('records a failed delivery after the retries run out', async () => {
      const { app, tickets, dispatcher, webhook, addMember } = await buildTestApp({ webhookStatuses: [500, 500, 500] });
      const { token } = await addMember('agent', 'dana@helpdesk.test');
      await tickets.insertTicket({ ticketCode: 'AB1234', status: 'Open', priority: 'High', creationMethod: 'webhook' });

      const res = await request(app).post('/api/webhook/tech-director/AB1234').set('Authorization', `Bearer ${token}`);
      expect(res.status).toBe(200);

      await dispatcher.drain();
      expect(webhook.calls).toHaveLength(3);
      const status = await request(app).get('/api/webhook/status/AB1234').set('Authorization', `Bearer ${token}`);
      expect(status.body.webhook).toMatchObject({ status: 'failed', attempts: 3 });

      const stored = await tickets.findTicketByCode('AB1234');
      expect(stored?.status).toBe('Referred to Tech Director');
      expect(stored?.referredAt).toBeInstanceOf(Date);
    });

    it('answers 404 without dispatching for unknown tickets', async () => {
      const { app, dispatcher, addMember } = await buildTestApp();
      const { token } = await addMember('agent', 'dana@helpdesk.test');

      const res = await request(app).post('/api/webhook/tech-director/ZZ0000').set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(404);
      expect(dispatcher.getStatus('ZZ0000')).toBeUndefined();
    });

    it('requires authentication', async () => {
      const { app } = await buildTestApp();
      const res = await request(app).post('/api/webhook/tech-director/AB1234');
      expect(res.status).toBe(401);
    });
  });

  it('reports unknown status for tickets never dispatched', async () => {
    const { app, addMember } = await buildTestApp();
    const { token } = await addMember('agent', 'dana@helpdesk.test');

    const res = await request(app).get('/api/webhook/status/AB1234').set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      ticketId: 'AB1234',
      webhook: { status: 'unknown', message: 'No webhook data found' },
    });
  });

  it('exposes dispatcher health without auth', async () => {
    const { app } = await buildTestApp();

    const res = await request(app).get('/api/webhook/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      success: true,
      status: 'operational',
      webhookUrl: TEST_WEBHOOK_URL,
      trackedWebhooks: 0,
      inFlight: 0,
    });
  });

  it('lets admins clear the status map', async () => {
    const { app, tickets, dispatcher, addMember } = await buildTestApp();
    const agent = await addMember('agent', 'dana@helpdesk.test');
    const admin = await addMember('admin', 'root@helpdesk.test');
    const ticket = await tickets.insertTicket({ ticketCode: 'AB1234', status: 'Open', priority: 'High', creationMethod: 'webhook' });
    dispatcher.dispatch('AB1234', ticket, 'referral', 'test');
    await dispatcher.drain();

    const denied = await request(app).post('/api/webhook/cleanup').set('Authorization', `Bearer ${agent.token}`);
    expect(denied.status).toBe(403);

    const res = await request(app).post('/api/webhook/cleanup').set('Authorization', `Bearer ${admin.token}`);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, cleared: 1, message: 'Cleared 1 webhook status entries' });
    expect(dispatcher.getStatus('AB1234')).toBeUndefined();
  });

  describe('test endpoint', () => {
    it('relays the automation answer', async () => {
      const { app, addMember } = await buildTestApp();
      const admin = await addMember('admin', 'root@helpdesk.test');

      const res = await request(app).post('/api/webhook/test').set('Authorization', `Bearer ${admin.token}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, webhookStatus: 200, webhookResponse: 'ok' });
    });

    it('answers 503 when no webhook URL is configured', async () => {
      const { app, addMember } = await buildTestApp({ env: { WEBHOOK_URL: '' } });
      const admin = await addMember('admin', 'root@helpdesk.test');

      const res = await request(app).post('/api/webhook/test').set('Authorization', `Bearer ${admin.token}`);

      expect(res.status).toBe(503);
      expect(res.body).toMatchObject({ error: { code: 'WEBHOOK_NOT_CONFIGURED' } });
    });
  });

  describe('inbound email', () => {
    it('creates a ticket for a new conversation', async () => {
      const { app, tickets } = await buildTestApp();

      const res = await request(app).post('/api/webhook/inbound').send({
        from: 'Casey <casey@example.com>',
        subject: 'Cannot log in',
        body: 'The login page spins forever.',
        thread_id: 'thread-1',
        priority: 'High',
      });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({ success: true, outcome: 'created', created: true });
      const code = res.body.ticketId as string;
      expect(await tickets.findTicketByCode(code)).toMatchObject({
        name: 'Casey',
        email: 'casey@example.com',
        priority: 'High',
        threadId: 'thread-1',
        creationMethod: 'webhook',
      });
    });

    it('adds a customer reply to the referenced ticket', async () => {
      const { app, tickets } = await buildTestApp();
      await tickets.insertTicket({ ticketCode: 'M3F9A2', status: 'Open', priority: 'Medium', creationMethod: 'webhook' });

      const res = await request(app).post('/api/webhook/inbound').send({
        ticket_id: '',
        body: 'regarding ticket #M3F9A2',
        from: 'a@b.com',
        message: 'still broken',
      });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        outcome: 'updated',
        ticketId: 'M3F9A2',
        created: false,
        matchedBy: 'extracted',
        ticket: { status: 'Customer Replied', hasUnreadReply: true },
      });
      expect(typeof res.body.replyId).toBe('string');
    });

    it('answers a repeated thread with the existing ticket', async () => {
      const { app, tickets } = await buildTestApp();
      await tickets.insertTicket({
        ticketCode: 'AB1234',
        status: 'Open',
        priority: 'Medium',
        creationMethod: 'webhook',
        threadId: 'thread-1',
        email: 'first@example.com',
      });

      const res = await request(app)
        .post('/api/webhook/inbound')
        .send({ thread_id: 'thread-1', from: 'second@example.com', body: 'again' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, duplicate: true, message: 'Ticket already exists', ticketId: 'AB1234' });
      expect(tickets.tickets.size).toBe(1);
    });

    it('adds a reply to the claimed ticket without a sender address', async () => {
      const { app, tickets } = await buildTestApp();
      await tickets.insertTicket({ ticketCode: 'AB1234', status: 'Open', priority: 'Medium', creationMethod: 'webhook' });

      const res = await request(app).post('/api/webhook/inbound').send({ ticket_id: 'AB1234', message: 'still broken' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        outcome: 'updated',
        ticketId: 'AB1234',
        matchedBy: 'claimed',
        ticket: { status: 'Customer Replied' },
      });
      expect(await tickets.listReplies('AB1234')).toHaveLength(1);
    });

    it('rejects payloads with nothing to reconcile', async () => {
      const { app } = await buildTestApp();
      const res = await request(app).post('/api/webhook/inbound').send({ subject: 'empty' });
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: { code: 'BAD_REQUEST' } });
    });

    it('accepts customer text that the audit would block elsewhere', async () => {
      const { app } = await buildTestApp();
      const res = await request(app)
        .post('/api/webhook/inbound')
        .send({ from: 'dev@example.com', body: 'The log says ../../var/log/app failed' });
      expect(res.status).toBe(201);
    });

    it('checks the shared secret when one is configured', async () => {
      const { app } = await buildTestApp({ env: { WEBHOOK_INBOUND_SECRET: 'test-secret' } });
      const payload = { from: 'casey@example.com', body: 'hello' };

      const missing = await request(app).post('/api/webhook/inbound').send(payload);
      expect(missing.status).toBe(401);
      expect(missing.body).toMatchObject({ error: { code: 'INVALID_WEBHOOK_SECRET' } });

      const ok = await request(app).post('/api/webhook/inbound').set('x-webhook-secret', 'test-secret').send(payload);
      expect(ok.status).toBe(201);
    });
  });

  describe('automation reply', () => {
    it('stores an automation reply without changing the status', async () => {
      const { app, tickets } = await buildTestApp();
      await tickets.insertTicket({ ticketCode: 'AB1234', status: 'Open', priority: 'Medium', creationMethod: 'webhook' });

      const res = await request(app).post('/api/webhook/reply').send({ ticket_id: 'ab1234', response: 'Auto reply text' });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        success: true,
        message: 'Reply added successfully',
        ticketId: 'AB1234',
        reply: { senderType: 'webhook', senderName: 'External System', message: 'Auto reply text' },
      });
      expect(await tickets.findTicketByCode('AB1234')).toMatchObject({
        status: 'Open',
        hasUnreadReply: true,
        lastReplySender: 'webhook',
      });
    });

    it('treats replies carrying an email as customer replies', async () => {
      const { app, tickets } = await buildTestApp();
      await tickets.insertTicket({ ticketCode: 'AB1234', status: 'Open', priority: 'Medium', creationMethod: 'webhook' });

      const res = await request(app)
        .post('/api/webhook/reply')
        .send({ ticket_id: 'AB1234', message: 'thanks', customer_email: 'casey@example.com' });

      expect(res.status).toBe(201);
      expect(res.body.reply).toMatchObject({ senderType: 'customer', senderName: 'casey@example.com' });
      expect((await tickets.findTicketByCode('AB1234'))?.status).toBe('Customer Replied');
    });

    it('answers 404 for unknown tickets and 400 for empty messages', async () => {
      const { app } = await buildTestApp();

      const unknown = await request(app).post('/api/webhook/reply').send({ ticket_id: 'ZZ0000', message: 'hello' });
      expect(unknown.status).toBe(404);

      const empty = await request(app).post('/api/webhook/reply').send({ ticket_id: 'ZZ0000', message: '' });
      expect(empty.status).toBe(400);
    });
  });
});
