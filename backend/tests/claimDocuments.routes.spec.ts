import request from 'supertest';

import { buildTestApp } from './helpers/testApp.js';

async function appWithTicket() {
  const ctx = await buildTestApp();
  const { member, token } = await ctx.addMember('agent', 'dana@helpdesk.test');
  await ctx.tickets.insertTicket({ ticketCode: 'AB1234', status: 'Open', priority: 'Medium', creationMethod: 'webhook' });
  return { ...ctx, member, auth: { Authorization: `Bearer ${token}` } };
}

describe('claim documents', () => {
  it('uploads, lists, downloads and soft-deletes a document', async () => {
    const { app, member, auth, tickets } = await appWithTicket();

    const upload = await request(app).post('/api/tickets/ab1234/claim-documents').set(auth).send({
      file_name: 'notes.txt',
      file_type: 'text/plain',
      file_data: 'aGVsbG8=',
      description: 'Workshop notes',
    });
    expect(upload.status).toBe(201);
    expect(upload.body).toMatchObject({
      success: true,
      message: 'Document uploaded successfully',
      document: {
        ticketCode: 'AB1234',
        fileName: 'notes.txt',
        fileType: 'text/plain',
        fileSize: 5,
        description: 'Workshop notes',
        uploadedBy: member.id,
      },
    });
    const documentId = upload.body.document.id as string;

    const list = await request(app).get('/api/tickets/AB1234/claim-documents').set(auth);
    expect(list.status).toBe(200);
    expect(list.body.count).toBe(1);
    expect(list.body.documents[0]).toMatchObject({ id: documentId, fileName: 'notes.txt' });
    expect(list.body.documents[0]).not.toHaveProperty('data');

    const download = await request(app).get(`/api/tickets/AB1234/claim-documents/${documentId}/download`).set(auth);
    expect(download.status).toBe(200);
    expect(download.headers['content-type']).toBe('text/plain');
    expect(download.headers['content-disposition']).toBe('attachment; filename="notes.txt"');
    expect(download.text).toBe('hello');

    const removed = await request(app).delete(`/api/tickets/AB1234/claim-documents/${documentId}`).set(auth);
    expect(removed.status).toBe(200);
    expect(removed.body).toEqual({ success: true, message: 'Document deleted successfully' });
    expect(tickets.claimDocuments[0]?.deletedAt).toBeInstanceOf(Date);

    const after = await request(app).get('/api/tickets/AB1234/claim-documents').set(auth);
    expect(after.body).toEqual({ success: true, documents: [], count: 0 });

    const gone = await request(app).get(`/api/tickets/AB1234/claim-documents/${documentId}/download`).set(auth);
    expect(gone.status).toBe(404);
    expect(gone.body).toMatchObject({ error: { code: 'CLAIM_DOCUMENT_NOT_FOUND' } });

    const again = await request(app).delete(`/api/tickets/AB1234/claim-documents/${documentId}`).set(auth);
    expect(again.status).toBe(404);
  });

  it('stores documents without a usable type as generic binary', async () => {
    const { app, auth } = await appWithTicket();

    const res = await request(app)
      .post('/api/tickets/AB1234/claim-documents')
      .set(auth)
      .send({ fileName: 'photo.jpg', data: 'aGk=' });

    expect(res.status).toBe(201);
    expect(res.body.document).toMatchObject({ fileType: 'application/octet-stream', fileSize: 2, description: '' });
  });

  it('answers 404 when the ticket does not exist', async () => {
    const { app, auth, tickets } = await appWithTicket();

    const res = await request(app)
      .post('/api/tickets/ZZ0000/claim-documents')
      .set(auth)
      .send({ fileName: 'receipt.pdf', fileType: 'application/pdf', data: 'aGk=' });

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ error: { code: 'TICKET_NOT_FOUND' } });
    expect(tickets.claimDocuments).toHaveLength(0);
  });

  it('rejects uploads without base64 file data', async () => {
    const { app, auth } = await appWithTicket();

    const missing = await request(app).post('/api/tickets/AB1234/claim-documents').set(auth).send({ fileName: 'a.txt' });
    expect(missing.status).toBe(400);
    expect(missing.body).toMatchObject({ error: { code: 'BAD_REQUEST' } });

    const garbled = await request(app)
      .post('/api/tickets/AB1234/claim-documents')
      .set(auth)
      .send({ fileName: 'a.txt', data: 'not base64!' });
    expect(garbled.status).toBe(400);
  });

  it('keeps documents of other tickets apart', async () => {
    const { app, auth, tickets } = await appWithTicket();
    await tickets.insertTicket({ ticketCode: 'CD5678', status: 'Open', priority: 'Medium', creationMethod: 'webhook' });
    const doc = await tickets.insertClaimDocument({
      ticketCode: 'CD5678',
      fileName: 'other.txt',
      fileType: 'text/plain',
      fileSize: 2,
      data: 'aGk=',
    });

    const list = await request(app).get('/api/tickets/AB1234/claim-documents').set(auth);
    expect(list.body.count).toBe(0);

    const cross = await request(app).delete(`/api/tickets/AB1234/claim-documents/${doc.id}`).set(auth);
    expect(cross.status).toBe(404);
  });

  it('requires authentication', async () => {
    const { app } = await buildTestApp();
    const res = await request(app).get('/api/tickets/AB1234/claim-documents');
    expect(res.status).toBe(401);
  });
});

describe('vehicle info', () => {
  it('merges supplied fields into the ticket', async () => {
    const { app, auth, tickets } = await appWithTicket();

    const first = await request(app)
      .put('/api/tickets/AB1234/vehicle-info')
      .set(auth)
      .send({ registration: 'ab12 cde', serviceDate: '2026-03-01', withinWarranty: true });
    expect(first.status).toBe(200);
    expect(first.body).toMatchObject({
      success: true,
      message: 'Vehicle information updated',
      ticket: { ticketCode: 'AB1234', vehicle: { registration: 'AB12 CDE', serviceDate: '2026-03-01', withinWarranty: true } },
    });

    const second = await request(app)
      .put('/api/tickets/AB1234/vehicle-info')
      .set(auth)
      .send({ technician: 'Sam', daysBetweenServiceClaim: 12 });
    expect(second.status).toBe(200);
    expect((await tickets.findTicketByCode('AB1234'))?.vehicle).toMatchObject({
      registration: 'AB12 CDE',
      serviceDate: '2026-03-01',
      withinWarranty: true,
      technician: 'Sam',
      daysBetweenServiceClaim: 12,
    });
  });

  it('rejects empty or malformed updates', async () => {
    const { app, auth } = await appWithTicket();

    const empty = await request(app).put('/api/tickets/AB1234/vehicle-info').set(auth).send({});
    expect(empty.status).toBe(400);

    const badDate = await request(app).put('/api/tickets/AB1234/vehicle-info').set(auth).send({ claimDate: '01/03/2026' });
    expect(badDate.status).toBe(400);
    expect(badDate.body).toMatchObject({ error: { code: 'BAD_REQUEST' } });
  });

  it('answers 404 for unknown tickets', async () => {
    const { app, auth } = await appWithTicket();
    const res = await request(app).put('/api/tickets/ZZ0000/vehicle-info').set(auth).send({ technician: 'Sam' });
    expect(res.status).toBe(404);
  });
});
