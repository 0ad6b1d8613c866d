import { describe, expect, it } from 'vitest';
import { collectionDue } from '../../src/modules/collections/domain/milk-collection.entity';
import { computeSaleAmounts } from '../../src/modules/sales/domain/sale.entity';
import { ValidationError } from '../../src/shared/errors/validation.error';

describe('collectionDue', () => {
  it('multiplies quantity by price and rounds to cents', () => {
    expect(collectionDue(12.5, 42)).toBe(525);
    expect(collectionDue(3.33, 3.33)).toBe(11.09);
  });

  it('rejects an amount the due column cannot hold', () => {
    expect(() => collectionDue(999999.99, 999999.99)).toThrow('Due amount is out of range');
  });
});

describe('computeSaleAmounts', () => {
  it('derives gross, net and due', () => {
    expect(computeSaleAmounts(10, 50, 20, 300)).toEqual({ gross: 500, net: 480, due: 180 });
  });

  it('allows a fully paid sale', () => {
    expect(computeSaleAmounts(2, 55, 0, 110).due).toBe(0);
  });

  it('rejects a discount above the gross amount', () => {
    try {
      computeSaleAmounts(1, 50, 60, 0);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect((error as ValidationError).fields).toEqual({ discount: 'Must not exceed 50.00' });
    }
  });

  it('rejects a gross amount the columns cannot hold', () => {
    expect(() => computeSaleAmounts(999999.99, 20000, 0, 0)).toThrow('Gross amount is out of range');
  });

  it('rejects a payment above the net amount', () => {
    expect(() => computeSaleAmounts(1, 50, 10, 45)).toThrow('Paid amount exceeds the net amount');
  });
});
