import { beforeEach, describe, expect, it } from 'vitest';
import { AuditLogRepository } from '../../src/modules/audit/infra/postgres-audit-log.repository';
import { BranchRepository } from '../../src/modules/branches/infra/postgres-branch.repository';
import { FarmerService } from '../../src/modules/farmers/application/farmer.service';
import { FarmerRepository } from '../../src/modules/farmers/infra/postgres-farmer.repository';
import { ConflictError, RecordNotFoundError } from '../../src/shared/errors/database.error';
import { ValidationError } from '../../src/shared/errors/validation.error';
import { setupTestDatabase } from '../helpers/test-database';

describe('FarmerService', () => {
  const audit = new AuditLogRepository();
  const service = new FarmerService(new FarmerRepository(), new BranchRepository(), audit);

  beforeEach(async () => {
    await setupTestDatabase();
  });

  it('lists the seeded farmer', async () => {
    const farmers = await service.list({});
    expect(farmers).toEqual([
      { id: 1, name: 'Farmer A', code: 'F001', contact: '7777777777', bankId: null, branchId: 1 },
    ]);
  });

  it('creates a farmer and records an audit entry', async () => {
    const farmer = await service.create(
      { name: 'Farmer B', code: 'F002', contact: '6666666666', bankId: null, branchId: 1 },
      'admin'
    );

    expect(farmer).toEqual({
      id: 2,
      name: 'Farmer B',
      code: 'F002',
      contact: '6666666666',
      bankId: null,
      branchId: 1,
    });

    const entries = await audit.list({ entity: 'farmer', limit: 10 });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ entityId: 2, action: 'create', actor: 'admin' });
    expect(entries[0].details).toMatchObject({ code: 'F002' });
  });

  it('rejects a duplicate farmer code', async () => {
    await expect(
      service.create({ name: 'Copy', code: 'F001', contact: '1', bankId: null, branchId: null }, 'admin')
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it('rejects an unknown branch before inserting', async () => {
    const attempt = service.create(
      { name: 'Farmer C', code: 'F003', contact: '5555555555', bankId: null, branchId: 42 },
      'admin'
    );

    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toMatchObject({
      message: 'Unknown branch',
      fields: { branchId: 'No branch with id 42' },
    });
    expect(await service.list({})).toHaveLength(1);
  });

  it('lets a farmer keep its own code on update', async () => {
    const updated = await service.update(
      1,
      { name: 'Farmer A Senior', code: 'F001', contact: '7777777777', bankId: 12, branchId: 1 },
      'admin'
    );

    expect(updated.name).toBe('Farmer A Senior');
    expect(updated.bankId).toBe(12);

    const [entry] = await audit.list({ entity: 'farmer', entityId: 1, limit: 1 });
    expect(entry.action).toBe('update');
    expect(entry.details).toMatchObject({ before: { name: 'Farmer A' }, after: { name: 'Farmer A Senior' } });
  });

  it('raises RecordNotFoundError for unknown ids', async () => {
    await expect(service.get(99)).rejects.toThrow("Farmer with identifier '99' not found");
    await expect(service.remove(99, 'admin')).rejects.toBeInstanceOf(RecordNotFoundError);
  });

  it('deletes a farmer without references', async () => {
    const farmer = await service.create(
      { name: 'Short Lived', code: 'F010', contact: '1', bankId: null, branchId: null },
      'admin'
    );

    await service.remove(farmer.id, 'admin');

    await expect(service.get(farmer.id)).rejects.toBeInstanceOf(RecordNotFoundError);
    const [entry] = await audit.list({ entity: 'farmer', entityId: farmer.id, limit: 1 });
    expect(entry.action).toBe('delete');
  });
});
