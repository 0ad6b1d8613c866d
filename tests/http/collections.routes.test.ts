import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { createTestApp, TestApp } from '../helpers/test-app';
import { setupTestDatabase } from '../helpers/test-database';

describe('/api/milk-collections', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    await setupTestDatabase();
    ctx = createTestApp();
  });

  const payload = {
    farmerId: 1,
    shiftId: 1,
    date: '2026-03-02',
    quantityLitres: '12.5',
    fatPercent: 4.2,
    pricePerLitre: 42,
    createdBy: 1,
  };

  it('creates, reads, updates and deletes a collection', async () => {
    const created = await request(ctx.app)
      .post('/api/milk-collections')
      .set('Authorization', ctx.authHeader)
      .send({ ...payload, dueAmount: 1 });

    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ id: 1, quantityLitres: 12.5, dueAmount: 525, notes: null });

    const fetched = await request(ctx.app).get('/api/milk-collections/1').set('Authorization', ctx.authHeader);
    expect(fetched.body.dueAmount).toBe(525);

    const updated = await request(ctx.app)
      .put('/api/milk-collections/1')
      .set('Authorization', ctx.authHeader)
      .send({ ...payload, quantityLitres: 10, notes: 'recounted' });
    expect(updated.status).toBe(200);
    expect(updated.body).toMatchObject({ quantityLitres: 10, dueAmount: 420, notes: 'recounted' });

    const deleted = await request(ctx.app).delete('/api/milk-collections/1').set('Authorization', ctx.authHeader);
    expect(deleted.status).toBe(204);

    const missing = await request(ctx.app).get('/api/milk-collections/1').set('Authorization', ctx.authHeader);
    expect(missing.status).toBe(404);
    expect(missing.body.error.code).toBe('RECORD_NOT_FOUND');

    const audit = await request(ctx.app)
      .get('/api/audit-logs?entity=milk_collection')
      .set('Authorization', ctx.authHeader);
    expect(audit.body.map((entry: { action: string }) => entry.action)).toEqual(['delete', 'update', 'create']);
    expect(audit.body[0].actor).toBe('admin');
  });

  it('reports field errors for invalid input', async () => {
    const res = await request(ctx.app)
      .post('/api/milk-collections')
      .set('Authorization', ctx.authHeader)
      .send({ ...payload, date: '02/03/2026', quantityLitres: -1 });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
    expect(Object.keys(res.body.error.fields).sort()).toEqual(['date', 'quantityLitres']);
  });

  it('rejects references to rows that do not exist', async () => {
    const res = await request(ctx.app)
      .post('/api/milk-collections')
      .set('Authorization', ctx.authHeader)
      .send({ ...payload, shiftId: 999 });

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Unknown shift',
      fields: { shiftId: 'No shift with id 999' },
    });
  });

  it('rejects an impossible calendar date', async () => {
    const res = await request(ctx.app)
      .post('/api/milk-collections')
      .set('Authorization', ctx.authHeader)
      .send({ ...payload, date: '2026-02-30' });

    expect(res.status).toBe(400);
    expect(res.body.error.fields).toEqual({ date: 'Invalid calendar date' });
  });

  it('rejects quantities with sub-cent precision or beyond the column', async () => {
    const precise = await request(ctx.app)
      .post('/api/milk-collections')
      .set('Authorization', ctx.authHeader)
      .send({ ...payload, quantityLitres: 10.004 });
    expect(precise.status).toBe(400);
    expect(precise.body.error.fields).toEqual({ quantityLitres: 'At most 2 decimal places' });

    const huge = await request(ctx.app)
      .post('/api/milk-collections')
      .set('Authorization', ctx.authHeader)
      .send({ ...payload, quantityLitres: 999999.99, pricePerLitre: 999999.99 });
    expect(huge.status).toBe(400);
    expect(huge.body.error.message).toBe('Due amount is out of range');

    const list = await request(ctx.app).get('/api/milk-collections').set('Authorization', ctx.authHeader);
    expect(list.body).toEqual([]);
  });

  it('rejects a non-numeric id', async () => {
    const res = await request(ctx.app).get('/api/milk-collections/abc').set('Authorization', ctx.authHeader);

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('filters the list by farmer and date', async () => {
    await request(ctx.app).post('/api/milk-collections').set('Authorization', ctx.authHeader).send(payload);
    await request(ctx.app)
      .post('/api/milk-collections')
      .set('Authorization', ctx.authHeader)
      .send({ ...payload, date: '2026-02-27' });

    const res = await request(ctx.app)
      .get('/api/milk-collections?farmerId=1&from=2026-03-01&to=2026-03-31')
      .set('Authorization', ctx.authHeader);

    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(1);
    expect(res.body[0].date).toBe('2026-03-02');
  });

  it('exposes the farmer balance', async () => {
    await request(ctx.app).post('/api/milk-collections').set('Authorization', ctx.authHeader).send(payload);
    await request(ctx.app)
      .post('/api/payments/farmers')
      .set('Authorization', ctx.authHeader)
      .send({ partyId: 1, date: '2026-03-03', amount: 500, mode: 'bank' });

    const res = await request(ctx.app).get('/api/farmers/1/balance').set('Authorization', ctx.authHeader);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ partyType: 'farmer', partyId: 1, totalDue: 525, totalPaid: 500, balance: 25 });
  });

  it('rejects a zero payment', async () => {
    const res = await request(ctx.app)
      .post('/api/payments/customers')
      .set('Authorization', ctx.authHeader)
      .send({ partyId: 1, date: '2026-03-03', amount: 0, mode: 'cash' });

    expect(res.status).toBe(400);
    expect(res.body.error.fields.amount).toBeDefined();
  });
});

describe('/api/reports', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    await setupTestDatabase();
    ctx = createTestApp();
  });

  it('downloads an Excel workbook named after the range', async () => {
    const res = await request(ctx.app)
      .get('/api/reports/collections?from=2026-03-01&to=2026-03-31')
      .set('Authorization', ctx.authHeader);

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe(
      'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
    );
    expect(res.headers['content-disposition']).toBe('attachment; filename="collections_2026-03-01_2026-03-31.xlsx"');
  });

  it('downloads a PDF', async () => {
    const res = await request(ctx.app)
      .get('/api/reports/sales?format=pdf&from=2026-03-01&to=2026-03-31')
      .set('Authorization', ctx.authHeader);

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('application/pdf');
    expect(res.headers['content-disposition']).toBe('attachment; filename="sales_2026-03-01_2026-03-31.pdf"');
  });

  it('rejects an unknown report kind', async () => {
    const res = await request(ctx.app).get('/api/reports/cattle').set('Authorization', ctx.authHeader);

    expect(res.status).toBe(400);
  });
});

describe('/api/dashboard/summary', () => {
  it('returns the totals for the requested date', async () => {
    await setupTestDatabase();
    const ctx = createTestApp();

    const res = await request(ctx.app)
      .get('/api/dashboard/summary?date=2026-03-02')
      .set('Authorization', ctx.authHeader);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      date: '2026-03-02',
      collections: { count: 0, litres: 0, amount: 0 },
      sales: { count: 0, litres: 0, amount: 0 },
    });
  });
});
