import { beforeEach, describe, expect, it } from 'vitest';
import { createContainer, Container } from '../../src/container';
import { RecordNotFoundError } from '../../src/shared/errors/database.error';
import { ValidationError } from '../../src/shared/errors/validation.error';
import { setupTestDatabase } from '../helpers/test-database';
import { testConfig } from '../helpers/test-app';

describe('collections, sales, payments and balances', () => {
  let container: Container;

  beforeEach(async () => {
    await setupTestDatabase();
    container = createContainer(testConfig);
  });

  it('computes the collection due amount server-side', async () => {
    const collection = await container.collections.create(
      {
        farmerId: 1,
        shiftId: 1,
        date: '2026-03-02',
        quantityLitres: 12.5,
        fatPercent: 4.2,
        pricePerLitre: 42,
        notes: null,
        createdBy: 1,
      },
      'admin'
    );

    expect(collection).toEqual({
      id: 1,
      farmerId: 1,
      shiftId: 1,
      date: '2026-03-02',
      quantityLitres: 12.5,
      fatPercent: 4.2,
      pricePerLitre: 42,
      dueAmount: 525,
      notes: null,
      createdBy: 1,
    });
  });

  it('rejects a collection for an unknown farmer', async () => {
    await expect(
      container.collections.create(
        {
          farmerId: 42,
          shiftId: null,
          date: '2026-03-02',
          quantityLitres: 1,
          fatPercent: 4,
          pricePerLitre: 40,
          notes: null,
          createdBy: null,
        },
        'admin'
      )
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('derives the farmer balance from collections and payments', async () => {
    const base = { farmerId: 1, shiftId: 1, fatPercent: 4, notes: null, createdBy: null };
    await container.collections.create({ ...base, date: '2026-03-01', quantityLitres: 10, pricePerLitre: 40 }, 'admin');
    await container.collections.create({ ...base, date: '2026-03-02', quantityLitres: 5, pricePerLitre: 42 }, 'admin');
    await container.farmerPayments.create(
      { partyId: 1, date: '2026-03-03', amount: 250, mode: 'cash', reference: null, notes: null, createdBy: null },
      'admin'
    );

    expect(await container.balances.farmerBalance(1)).toEqual({
      partyType: 'farmer',
      partyId: 1,
      totalDue: 610,
      totalPaid: 250,
      balance: 360,
    });
  });

  it('derives the customer balance from sale dues and payments', async () => {
    await container.sales.create(
      {
        customerId: 1,
        shiftId: 1,
        date: '2026-03-01',
        quantityLitres: 10,
        unitPrice: 50,
        discount: 20,
        paidAmount: 300,
        createdBy: null,
      },
      'admin'
    );
    await container.customerPayments.create(
      { partyId: 1, date: '2026-03-05', amount: 100, mode: 'upi', reference: 'TXN-1', notes: null, createdBy: null },
      'admin'
    );

    expect(await container.balances.customerBalance(1)).toEqual({
      partyType: 'customer',
      partyId: 1,
      totalDue: 180,
      totalPaid: 100,
      balance: 80,
    });
  });

  it('reports a missing party', async () => {
    await expect(container.balances.customerBalance(7)).rejects.toBeInstanceOf(RecordNotFoundError);
  });

  it('summarizes a day for the dashboard', async () => {
    const base = { farmerId: 1, shiftId: 1, fatPercent: 4, notes: null, createdBy: null };
    await container.collections.create({ ...base, date: '2026-03-01', quantityLitres: 10, pricePerLitre: 40 }, 'admin');
    await container.collections.create({ ...base, date: '2026-03-01', quantityLitres: 2.5, pricePerLitre: 40 }, 'admin');
    await container.collections.create({ ...base, date: '2026-03-02', quantityLitres: 99, pricePerLitre: 40 }, 'admin');

    const summary = await container.dashboard.getSummary('2026-03-01');

    expect(summary).toEqual({
      date: '2026-03-01',
      collections: { count: 2, litres: 12.5, amount: 500 },
      sales: { count: 0, litres: 0, amount: 0 },
    });
  });

  it('filters and pages collections', async () => {
    const base = { farmerId: 1, shiftId: 1, fatPercent: 4, notes: null, createdBy: null, pricePerLitre: 40 };
    await container.collections.create({ ...base, date: '2026-03-01', quantityLitres: 1 }, 'admin');
    await container.collections.create({ ...base, date: '2026-03-02', quantityLitres: 2 }, 'admin');
    await container.collections.create({ ...base, date: '2026-03-03', quantityLitres: 3 }, 'admin');

    const page = await container.collections.list({ from: '2026-03-02', limit: 1, offset: 0 });

    expect(page.map((c) => c.date)).toEqual(['2026-03-03']);
  });
});
