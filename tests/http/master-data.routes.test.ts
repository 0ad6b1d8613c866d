import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { createTestApp, TestApp } from '../helpers/test-app';
import { setupTestDatabase } from '../helpers/test-database';

interface RoundTripCase {
  path: string;
  entity: string;
  create: Record<string, unknown>;
  created: Record<string, unknown>;
  update: Record<string, unknown>;
  updated: Record<string, unknown>;
}

const cases: RoundTripCase[] = [
  {
    path: '/api/branches',
    entity: 'branch',
    create: { name: 'North Branch', address: '  ', contact: '9000000001' },
    created: { id: 2, name: 'North Branch', address: null, contact: '9000000001' },
    update: { name: 'North Depot', address: 'Ring Road' },
    updated: { id: 2, name: 'North Depot', address: 'Ring Road', contact: null },
  },
  {
    path: '/api/employees',
    entity: 'employee',
    create: { name: 'Collector One', contact: '9000000002', branchId: 1, role: 'Collector' },
    created: { id: 2, name: 'Collector One', contact: '9000000002', branchId: 1, role: 'Collector' },
    update: { name: 'Collector One', contact: '9000000002', branchId: null, role: 'Supervisor' },
    updated: { id: 2, name: 'Collector One', contact: '9000000002', branchId: null, role: 'Supervisor' },
  },
  {
    path: '/api/customers',
    entity: 'customer',
    create: { name: 'Customer Y', contact: '9000000003', branchId: 1 },
    created: { id: 2, name: 'Customer Y', contact: '9000000003', branchId: 1 },
    update: { name: 'Customer Y Hotel', contact: '9000000003', branchId: '' },
    updated: { id: 2, name: 'Customer Y Hotel', contact: '9000000003', branchId: null },
  },
  {
    path: '/api/shifts',
    entity: 'shift',
    create: { name: 'Evening', startTime: '17:00', endTime: '20:30' },
    created: { id: 2, name: 'Evening', startTime: '17:00', endTime: '20:30' },
    update: { name: 'Late Evening', startTime: '18:00', endTime: null },
    updated: { id: 2, name: 'Late Evening', startTime: '18:00', endTime: null },
  },
];

describe('master data routes', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    await setupTestDatabase();
    ctx = createTestApp();
  });

  it.each(cases)('$path supports add, list, update and delete', async (testCase) => {
    const auth = ctx.authHeader;

    const created = await request(ctx.app).post(testCase.path).set('Authorization', auth).send(testCase.create);
    expect(created.status).toBe(201);
    expect(created.body).toEqual(testCase.created);

    const listed = await request(ctx.app).get(testCase.path).set('Authorization', auth);
    expect(listed.status).toBe(200);
    expect(listed.body.map((row: { id: number }) => row.id)).toEqual([1, 2]);

    const updated = await request(ctx.app).put(`${testCase.path}/2`).set('Authorization', auth).send(testCase.update);
    expect(updated.status).toBe(200);
    expect(updated.body).toEqual(testCase.updated);

    const deleted = await request(ctx.app).delete(`${testCase.path}/2`).set('Authorization', auth);
    expect(deleted.status).toBe(204);

    const missing = await request(ctx.app).get(`${testCase.path}/2`).set('Authorization', auth);
    expect(missing.status).toBe(404);

    const audit = await request(ctx.app)
      .get(`/api/audit-logs?entity=${testCase.entity}&entityId=2`)
      .set('Authorization', auth);
    expect(audit.body.map((entry: { action: string }) => entry.action)).toEqual(['delete', 'update', 'create']);
  });

  it('rejects an employee in an unknown branch', async () => {
    const res = await request(ctx.app)
      .post('/api/employees')
      .set('Authorization', ctx.authHeader)
      .send({ name: 'Nobody', contact: '1', branchId: 999, role: 'Clerk' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'Unknown branch', fields: { branchId: 'No branch with id 999' } },
    });
  });

  it('rejects a customer in an unknown branch on update', async () => {
    const res = await request(ctx.app)
      .put('/api/customers/1')
      .set('Authorization', ctx.authHeader)
      .send({ name: 'Customer X', contact: '5555555555', branchId: 7 });

    expect(res.status).toBe(400);
    expect(res.body.error.fields).toEqual({ branchId: 'No branch with id 7' });
  });

  it('rejects a shift that starts when it ends', async () => {
    const res = await request(ctx.app)
      .post('/api/shifts')
      .set('Authorization', ctx.authHeader)
      .send({ name: 'Zero', startTime: '06:00', endTime: '06:00' });

    expect(res.status).toBe(400);
    expect(res.body.error.fields).toEqual({ endTime: 'Same as start time' });
  });
});
